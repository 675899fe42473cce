import { Command } from 'commander';
import { ConfigManager } from '@bindery/core';
import { runAction } from '../context.js';

export const configCommand = new Command('config')
  .description('Inspect Bindery configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: { config?: string }) => {
    await runAction(async () => {
      const mgr = new ConfigManager();
      const config = await mgr.load({ configPath: options.config });
      console.log(JSON.stringify(config, null, 2));
    });
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched from the working directory upward (first found wins):');
    console.log('  1. bindery.config.yaml');
    console.log('  2. bindery.config.yml');
    console.log('  3. bindery.config.json');
    console.log('');
    console.log('Environment variables:');
    console.log('  BINDERY_EXTENSION_REPOSITORY');
    console.log('  BINDERY_EXTENSIONS_DIR');
    console.log('  BINDERY_UPDATE_STRATEGY');
    console.log('  BINDERY_SERVER_PORT');
    console.log('  BINDERY_SERVER_HOST');
    console.log('  BINDERY_API_KEY');
    console.log('  BINDERY_LOG_LEVEL');
  });
