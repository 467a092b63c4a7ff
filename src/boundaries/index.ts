export { parseCliOptions } from './cli-parser';
export { parseEnvironment } from './env-parser';
export { decodeMessage, type LetterContent } from './message-decoder';
