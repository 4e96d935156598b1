export * from './contracts.js';
export * from './errors.js';
export * from './platform/platform.js';
export * from './identity/fileName.js';
export * from './description/description.js';
export * from './merge/merge.js';
export * from './codec/descriptionCodec.js';
export * from './reconcile/reconcile.js';
export * from './probe/httpProbe.js';
export * from './compiler/manifestCompiler.js';
export * from './staging/staging.js';
export * from './config/config.js';
export * from './logging/logger.js';
export { compareUtf8, contentHash128, parseHash128, parseSha256, sha256Hex } from './utils/hash.js';
