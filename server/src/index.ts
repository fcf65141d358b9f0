export { startRangeServer, DEFAULT_PORT, type RangeServer, type RangeServerOptions } from './runtime.js';
export {
  createFileRequestHandler,
  type FileRequestHandler,
  type FileRequestHandlerOptions,
} from './file-handler.js';
export { withFileHandle, pipeFileRange } from './stream-utils.js';
