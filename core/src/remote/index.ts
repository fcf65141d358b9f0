export {
  openRemoteFile,
  DEFAULT_READ_AHEAD_BYTES,
  DEFAULT_REMOTE_TIMEOUT_MS,
  type FetchFn,
  type RemoteFile,
  type RemoteFileOptions,
  type RemoteFileStats,
} from './remote-file.js';
