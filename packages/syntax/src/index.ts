export {
  createParser,
  parseSource,
  lazyQuery,
  nodesContaining,
  containsSyntaxError,
  pointAt,
  advancePoint,
} from './parser';
export type { SyntaxTree, SyntaxNode, Point, QueryMatch } from './parser';
export { SourceDocument } from './document';
export type { TextEdit, Replacement, ReplacementRule, ReplaceOptions } from './document';
