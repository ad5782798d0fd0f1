#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError } from 'commander';
import { registerSearchCommand } from './commands/search.js';
import { registerClassifyCommand } from './commands/classify.js';
import { registerIndexCommand } from './commands/index.js';
import { registerMetadataCommand } from './commands/metadata.js';
import { registerMcpCommand } from './commands/mcp.js';
import { errorMessage } from '../shared/Logger.js';

/** 往上尋找本套件的 package.json（src/ 與 dist/src/ 的深度不同） */
function readPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

const version = readPackageVersion();

const program = new Command();

program
  .name('catsearch')
  .description('Multilingual hybrid keyword + vector search over a catalogue of document pages')
  .version(version);

registerSearchCommand(program);
registerClassifyCommand(program);
registerIndexCommand(program);
registerMetadataCommand(program);
registerMcpCommand(program, version);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}

void main();
