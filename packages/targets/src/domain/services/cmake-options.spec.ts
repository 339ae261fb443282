import { describe, expect, it } from 'vitest';

import {
  InvalidCMakeOptionError,
  findConflictingOptions,
  parseCMakeOption,
  renderCMakeArguments,
} from './cmake-options.js';

describe('parseCMakeOption', () => {
  it('splits an option on its first equals sign', () => {
    expect(parseCMakeOption('CMAKE_CXX_FLAGS=-O2 -DX=1')).toEqual({
      key: 'CMAKE_CXX_FLAGS',
      value: '-O2 -DX=1',
    });
  });

  it('keeps a typed cache entry suffix in the key', () => {
    expect(parseCMakeOption('DLIB_USE_BLAS:BOOL=ON')).toEqual({
      key: 'DLIB_USE_BLAS:BOOL',
      value: 'ON',
    });
  });

  it('accepts an empty value', () => {
    expect(parseCMakeOption('OPENBLAS_LIBS=')).toEqual({ key: 'OPENBLAS_LIBS', value: '' });
  });

  it.each(['DLIB_USE_BLAS', '=ON', '1ABC=ON', 'WITH SPACE=ON'])('rejects %j', (option) => {
    expect(() => parseCMakeOption(option)).toThrow(InvalidCMakeOptionError);
  });
});

describe('renderCMakeArguments', () => {
  it('prefixes each option with -D in order', () => {
    expect(renderCMakeArguments(['DLIB_USE_CUDA=OFF', 'DLIB_USE_BLAS=ON'])).toEqual([
      '-DDLIB_USE_CUDA=OFF',
      '-DDLIB_USE_BLAS=ON',
    ]);
  });
});

describe('findConflictingOptions', () => {
  it('returns nothing when every key has one value', () => {
    expect(
      findConflictingOptions(['DLIB_USE_BLAS=ON', 'DLIB_USE_CUDA=OFF', 'DLIB_USE_BLAS=ON']),
    ).toEqual([]);
  });

  it('reports keys assigned different values', () => {
    expect(
      findConflictingOptions(['DLIB_USE_BLAS=ON', 'DLIB_USE_CUDA=OFF', 'DLIB_USE_BLAS:BOOL=OFF']),
    ).toEqual([{ key: 'DLIB_USE_BLAS', values: ['ON', 'OFF'] }]);
  });
});
