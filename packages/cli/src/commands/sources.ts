import { Command } from 'commander';
import { type CliOptions, type OpenBindery, openBindery, parseSourceId, runAction } from '../context.js';
import { formatSource, formatSourceDetail, formatSourceList } from '../output/formatter.js';

export function createSourcesCommand(open: OpenBindery = openBindery): Command {
  const command = new Command('sources')
    .description('Manage source extensions')
    .option('-c, --config <path>', 'Config file path')
    .option('--repo <url>', 'Extension repository (overrides extensions.repository)');

  command
    .command('list')
    .description('List installed sources')
    .option('-u, --check-updates', 'Compare against the repository')
    .action(async (options: { checkUpdates?: boolean }, cmd: Command) => {
      await runAction(async () => {
        const bindery = await open(cmd.optsWithGlobals<CliOptions>());
        const sources = await bindery.sources.installedSources({ checkUpdates: options.checkUpdates ?? false });
        console.log(formatSourceList('Installed sources', sources));
      });
    });

  command
    .command('available')
    .description('List sources in the repository that are not installed')
    .action(async (_options: unknown, cmd: Command) => {
      await runAction(async () => {
        const bindery = await open(cmd.optsWithGlobals<CliOptions>());
        console.log(formatSourceList('Available sources', await bindery.sources.availableSources()));
      });
    });

  command
    .command('info')
    .description('Show an installed source')
    .argument('<id>', 'Source id', parseSourceId)
    .action(async (id: number, _options: unknown, cmd: Command) => {
      await runAction(async () => {
        const bindery = await open(cmd.optsWithGlobals<CliOptions>());
        console.log(formatSourceDetail(await bindery.sources.getSourceById(id)));
      });
    });

  command
    .command('install')
    .description('Install a source from the repository')
    .argument('<id>', 'Source id', parseSourceId)
    .action(async (id: number, _options: unknown, cmd: Command) => {
      await runAction(async () => {
        const bindery = await open(cmd.optsWithGlobals<CliOptions>());
        const source = await bindery.sources.installSource(id);
        console.log(`Installed:\n${formatSource(source)}`);
      });
    });

  command
    .command('update')
    .description('Update an installed source to the repository version')
    .argument('<id>', 'Source id', parseSourceId)
    .action(async (id: number, _options: unknown, cmd: Command) => {
      await runAction(async () => {
        const bindery = await open(cmd.optsWithGlobals<CliOptions>());
        const source = await bindery.sources.updateSource(id);
        console.log(`Updated:\n${formatSource(source)}`);
      });
    });

  command
    .command('uninstall')
    .description('Remove an installed source')
    .argument('<id>', 'Source id', parseSourceId)
    .action(async (id: number, _options: unknown, cmd: Command) => {
      await runAction(async () => {
        const bindery = await open(cmd.optsWithGlobals<CliOptions>());
        await bindery.sources.uninstallSource(id);
        console.log(`Uninstalled: ${id}`);
      });
    });

  return command;
}

export const sourcesCommand = createSourcesCommand();
