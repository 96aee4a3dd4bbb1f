import { Command, CommandRunner, Option } from 'nest-commander';
import { Injectable } from '@nestjs/common';
import * as path from 'path';
import { StorageService } from '../services/storage.service.js';
import { ConfigService } from '../services/config.service.js';
import { formatError, getExitCode } from '../errors/exit-codes.js';
import {
  ICONS,
  logStep,
  logSuccess,
  logWarning,
} from '../shared/utils/console-icons.js';

interface InitCommandOptions {
  force?: boolean;
}

@Injectable()
@Command({
  name: 'init',
  description: 'Initialize an fps-gate workspace with a default config',
})
export class InitCommand extends CommandRunner {
  constructor(
    private readonly storageService: StorageService,
    private readonly configService: ConfigService,
  ) {
    super();
  }

  async run(
    _passedParams: string[],
    options: InitCommandOptions,
  ): Promise<void> {
    process.exit(await this.execute(options));
  }

  async execute(options: InitCommandOptions): Promise<number> {
    try {
      logStep('Initializing fps-gate workspace...\n');

      const configPath = this.storageService.getConfigPath();
      if ((await this.storageService.exists(configPath)) && !options.force) {
        logWarning(
          'Workspace already initialized. Use --force to reinitialize.\n',
        );
        return 0;
      }

      logStep('Creating directory structure...');
      await this.storageService.ensureDirectories();
      const baseDir = this.storageService.getBaseDir();
      console.log(`   ├── ${baseDir}/`);
      console.log(`   ├── ${path.join(baseDir, 'traces')}/`);
      console.log(`   └── ${path.join(baseDir, 'reports')}/\n`);

      logStep('Generating default configuration...');
      const config = this.configService.getDefaultConfig();
      await this.configService.saveConfig(config);
      console.log('   └── config.yaml\n');

      logSuccess('Workspace initialized successfully!\n');
      console.log('Next steps:');
      console.log(
        `  1. Save a DevTools performance trace into ${this.storageService.getTracesDir()}/`,
      );
      console.log('  2. Run `fps-gate analyze --latest`');
      console.log(
        `  3. Tune the gate in ${configPath} or with --min-fps / --trim\n`,
      );
      return 0;
    } catch (error) {
      console.error(`\n${ICONS.failure} ${formatError(error)}`);
      return getExitCode(error);
    }
  }

  @Option({
    flags: '-f, --force',
    description: 'Overwrite an existing config.yaml',
  })
  parseForce(): boolean {
    return true;
  }
}
