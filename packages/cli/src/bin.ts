#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { createProcessCliIo, findCliManifest, runRigbuildCli } from './index.js';

const manifest = await findCliManifest(path.dirname(fileURLToPath(import.meta.url)));
const io = createProcessCliIo({ process });

const exitCode = await runRigbuildCli({
  programName: 'rigbuild',
  version: manifest.version ?? '0.0.0',
  description: manifest.description ?? '',
  io,
});

io.exit(exitCode);
