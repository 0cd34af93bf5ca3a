export {
  scanDirectives,
  parseAssistantTurn,
  formatDirective,
  type Segment,
  type TextSegment,
  type DirectiveSegment,
  type MalformedSegment,
  type ParsedItem,
  type ParsedTurn,
} from './directives.js';
