/**
 * Cross-context protocol exports.
 */
export { CoordinationClient, type CoordinationClientOptions } from './client.js';
export { DatabaseHost, type DatabaseHostOptions } from './host.js';
export { RemoteQueryError, UpstreamProtocolError } from './errors.js';
export {
    LOCK_MESSAGE_KINDS,
    QUERY_MESSAGE_KINDS,
    ErrorCodeSchema,
    HostMessageSchema,
    RequestSchema,
} from './messages.js';
export type { ErrorCode, HostMessage, MessageKind, Request } from './messages.js';
export { serveHost, type ControlPort, type ServeOptions } from './serve.js';
export { spawnHost, type HostHandle, type SpawnOptions } from './spawn.js';
