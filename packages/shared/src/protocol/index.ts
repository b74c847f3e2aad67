export {
  LINE_DELIMITER,
  TOPIC_SEPARATOR,
  type ParseFailureReason,
  type ParseResult,
  type DecodedLine,
  parseLine,
  formatLine,
  decodeLine,
  hasFramingHazard,
} from './line-codec.js';

export {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  isRecoverable,
  getHttpStatus,
  BridgeError,
  errorMessage,
} from './errors.js';
