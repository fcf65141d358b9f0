export type {
  ByteRange,
  FileMethod,
  RangeInvalidCode,
  RangeParseResult,
  ResponseHeaders,
  ResponsePlan,
} from './types.js';
export { parseRangeHeader } from './parse-range.js';
export { composeResponse, formatContentRange, type ComposeResponseInput } from './compose-response.js';
