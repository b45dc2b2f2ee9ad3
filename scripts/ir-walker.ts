#!/usr/bin/env node
import { cac } from 'cac';
import { VERSION } from '../src/index.js';
import { checkCommand } from '../src/cli/commands/check.js';
import { printCommand } from '../src/cli/commands/print.js';
import { walkCommand, type WalkOptions } from '../src/cli/commands/walk.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

async function main(): Promise<void> {
  const cli = cac('ir-walker');

  cli
    .command('walk <file>', '按深度优先顺序列出图中所有节点')
    .option('--json', '以 JSON 格式输出（含 id、kind、depth）', { default: false })
    .action(
      wrapAction(async (file: string, options: WalkOptions) => {
        await walkCommand(file, { json: Boolean(options.json) });
      })
    );

  cli
    .command('check <file>', '校验图的所有权与回指约束')
    .action(wrapAction(async (file: string) => checkCommand(file)));

  cli
    .command('print <file>', '以缩进文本输出图结构')
    .action(wrapAction(async (file: string) => printCommand(file)));

  cli.help();
  cli.version(VERSION);
  cli.parse(process.argv, { run: false });

  if (!cli.matchedCommand) {
    cli.outputHelp();
    return;
  }
  await cli.runMatchedCommand();
}

main().catch(handleError);
