export type { TargetDescriptor } from './target-descriptor.js';
export type { TargetHostPort } from './target-host.js';
