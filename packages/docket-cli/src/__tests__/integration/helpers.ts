// packages/docket-cli/src/__tests__/integration/helpers.ts
import fs from 'fs';
import path from 'path';
import os from 'os';
import { vi } from 'vitest';
import { run } from '../../index.js';

export interface TestContext {
  tempDir: string;
  dbPath: string;
  configPath: string;
  cleanup: () => void;
}

export interface RunOutput {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}

class ExitSignal extends Error {
  constructor(public readonly exitCode: number) {
    super(`exit:${exitCode}`);
  }
}

export function createTestContext(): TestContext {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docket-integration-'));
  return {
    tempDir,
    dbPath: path.join(tempDir, 'test.db'),
    configPath: path.join(tempDir, 'config.json'),
    cleanup: () => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    },
  };
}

function stringify(args: unknown[]): string {
  return args.map(String).join(' ');
}

/** Run the CLI in this process against the context's database and config. */
export async function docket(ctx: TestContext, args: string[]): Promise<RunOutput> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const originalConfig = process.env.DOCKET_CONFIG;
  process.env.DOCKET_CONFIG = ctx.configPath;

  const logSpy = vi.spyOn(console, 'log').mockImplementation((...line: unknown[]) => {
    stdout.push(stringify(line));
  });
  const errorSpy = vi.spyOn(console, 'error').mockImplementation((...line: unknown[]) => {
    stderr.push(stringify(line));
  });
  const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
    throw new ExitSignal(Number(code ?? 0));
  });

  let exitCode = 0;
  try {
    await run(['node', 'docket', '--db', ctx.dbPath, ...args]);
  } catch (error) {
    if (!(error instanceof ExitSignal)) {
      throw error;
    }
    exitCode = error.exitCode;
  } finally {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    exitSpy.mockRestore();
    if (originalConfig === undefined) {
      delete process.env.DOCKET_CONFIG;
    } else {
      process.env.DOCKET_CONFIG = originalConfig;
    }
  }

  return { exitCode, stdout, stderr };
}

/** Run with `--format json` and return the success envelope's data. */
export async function docketJson(ctx: TestContext, args: string[]): Promise<unknown> {
  const output = await docket(ctx, ['--format', 'json', ...args]);
  if (output.exitCode !== 0) {
    throw new Error(`docket ${args.join(' ')} exited ${output.exitCode}: ${output.stdout.join('\n')}`);
  }
  const envelope: unknown = JSON.parse(output.stdout.join('\n'));
  if (typeof envelope !== 'object' || envelope === null || !('data' in envelope)) {
    throw new Error(`Unexpected output: ${output.stdout.join('\n')}`);
  }
  return envelope.data;
}
