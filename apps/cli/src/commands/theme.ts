import { Command } from 'commander';
import { ThemeModeName } from '@protask/core';
import * as out from '../output.js';
import { run, type CliContext } from '../context.js';

export function createThemeCommand(ctx: CliContext): Command {
  return new Command('theme')
    .description('Show or change the theme preference')
    .argument('[action]', 'show, toggle or system', 'show')
    .action(async (actionName: string, _opts: unknown, cmd: Command) => {
      await run(ctx, cmd, () => {
        const { theme } = ctx;
        switch (actionName.toLowerCase()) {
          case 'show':
            out.info(`Theme: ${ThemeModeName[theme.mode]}`);
            return;
          case 'toggle':
            out.success(`Theme: ${ThemeModeName[theme.toggle()]}`);
            return;
          case 'system':
            out.success(`Theme: ${ThemeModeName[theme.useSystem()]}`);
            return;
          default:
            throw new Error(`Unknown theme action '${actionName}'. Use show, toggle or system.`);
        }
      });
    });
}
