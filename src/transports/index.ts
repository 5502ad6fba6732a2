export { LocalDefaultsTransport } from './local.js';
export { BlockDeviceTransport } from './block_device.js';
export { NetworkShareTransport, toNfsShare, toSmbShare, shareMountArgs } from './network_share.js';
export type { ShareProtocol } from './network_share.js';
export { HttpFetchTransport, candidateUrl, HTTP_TIMEOUT_MS } from './http.js';
export type { FetchFunction } from './http.js';
export { stageFromDirectory, STAGED_FILE_MODE } from './staging.js';
