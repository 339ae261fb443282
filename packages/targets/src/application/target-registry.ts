import type { TargetDescriptor } from '../domain/ports/target-descriptor.js';
import { dlibTarget } from '../targets/dlib/dlib-target.js';

export class UnknownTargetError extends Error {
  constructor(
    readonly target: string,
    readonly available: readonly string[],
  ) {
    super(
      available.length > 0
        ? `Unknown target "${target}". Available targets: ${available.join(', ')}.`
        : `Unknown target "${target}". No targets are registered.`,
    );
    this.name = 'UnknownTargetError';
  }
}

export class DuplicateTargetError extends Error {
  constructor(readonly target: string) {
    super(`Target "${target}" is already registered.`);
    this.name = 'DuplicateTargetError';
  }
}

export class TargetRegistry {
  private readonly descriptors = new Map<string, TargetDescriptor>();

  constructor(descriptors: Iterable<TargetDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  register(descriptor: TargetDescriptor): this {
    if (this.descriptors.has(descriptor.name)) {
      throw new DuplicateTargetError(descriptor.name);
    }
    this.descriptors.set(descriptor.name, descriptor);
    return this;
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  resolve(name: string): TargetDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new UnknownTargetError(name, this.list());
    }
    return descriptor;
  }

  list(): string[] {
    return [...this.descriptors.keys()].sort();
  }
}

export const createDefaultTargetRegistry = (): TargetRegistry => new TargetRegistry([dlibTarget]);
