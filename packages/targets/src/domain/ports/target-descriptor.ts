import type { PlatformContext } from '../models/platform.js';
import type { TargetHostPort } from './target-host.js';

export interface TargetDescriptor {
  readonly name: string;
  dependencies(host: TargetHostPort): void;
  configure(context: PlatformContext, host: TargetHostPort): void;
  package(context: PlatformContext, host: TargetHostPort): void;
}
