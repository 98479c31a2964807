import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { z } from 'zod';
import {
  createRegistryClient,
  createUpgradeCommand,
  type UpgradeParams,
  type UpgradeServices,
} from './commands/upgrade.ts';
import { ConsoleLog } from './src/logging/CommandLog.ts';
import { LocalBuildFileStore } from './src/services/BuildFileStore.ts';
import { InquirerPromptService } from './src/services/PromptService.ts';

// Read version from package.json so releases only need to update one file
const packageJsonPath = new URL('./package.json', import.meta.url);
const packageJson = z
  .object({ version: z.string().optional() })
  .parse(JSON.parse(await readFile(packageJsonPath, 'utf8')));
const VERSION = packageJson.version ?? '0.0.0';

const controller = new AbortController();
const onSigint = () => controller.abort();
process.on('SIGINT', onSigint);

function createServices(params: UpgradeParams): UpgradeServices {
  return {
    Log: new ConsoleLog({ verbose: params.Verbose }),
    Files: new LocalBuildFileStore(resolve(params.Cwd)),
    Prompts: new InquirerPromptService(),
    Registry: createRegistryClient,
    Interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
    Env: process.env,
    Signal: controller.signal,
  };
}

const program = new Command('sbt-upgrade')
  .version(VERSION)
  .description('Interactive dependency upgrades for sbt builds.')
  .addCommand(
    createUpgradeCommand(createServices, (code) => {
      process.exitCode = code;
    }),
    { isDefault: true },
  );

try {
  await program.parseAsync(process.argv);
} finally {
  process.off('SIGINT', onSigint);
}
