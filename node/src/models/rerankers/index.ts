export { TeiCrossEncoder } from './tei';
export type { TeiCrossEncoderConfig } from './tei';
export { LexicalScorer } from './lexical';
