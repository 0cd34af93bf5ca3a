export type Role = 'user' | 'assistant';

export type Message = {
  readonly role: Role;
  readonly content: string;
};

export function userMessage(content: string): Message {
  return {
    role: 'user',
    content,
  };
}

export function assistantMessage(content: string): Message {
  return {
    role: 'assistant',
    content,
  };
}
