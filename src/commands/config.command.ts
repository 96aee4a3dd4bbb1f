/**
 * Config Commands
 * Inspect and validate the gate configuration
 */

import { Command, CommandRunner, SubCommand, Option } from 'nest-commander';
import { Injectable } from '@nestjs/common';
import * as yaml from 'js-yaml';
import { ConfigService } from '../services/config.service.js';
import { StorageService } from '../services/storage.service.js';
import { ConfigError } from '../errors/error-types.js';
import { formatError, getExitCode } from '../errors/exit-codes.js';
import {
  ICONS,
  logFailure,
  logSuccess,
  logWarning,
} from '../shared/utils/console-icons.js';

interface ConfigShowOptions {
  file?: string;
  json?: boolean;
}

interface ConfigValidateOptions {
  file?: string;
}

/**
 * Prints the effective configuration, defaults filled in
 */
@Injectable()
@SubCommand({
  name: 'show',
  description: 'Print the effective gate configuration',
})
export class ConfigShowCommand extends CommandRunner {
  constructor(private readonly configService: ConfigService) {
    super();
  }

  async run(
    _passedParams: string[],
    options: ConfigShowOptions,
  ): Promise<void> {
    process.exit(await this.execute(options));
  }

  async execute(options: ConfigShowOptions): Promise<number> {
    try {
      const config = await this.configService.loadConfig(options.file);
      if (options.json) {
        console.log(JSON.stringify(config, null, 2));
      } else {
        console.log(yaml.dump(config, { indent: 2, lineWidth: 120 }));
      }
      return 0;
    } catch (error) {
      console.error(`${ICONS.failure} ${formatError(error)}`);
      return getExitCode(error);
    }
  }

  @Option({
    flags: '-f, --file <path>',
    description: 'Path to config.yaml (default: .fps-gate/config.yaml)',
  })
  parseFile(val: string): string {
    return val;
  }

  @Option({
    flags: '-j, --json',
    description: 'Print as JSON instead of YAML',
  })
  parseJson(): boolean {
    return true;
  }
}

/**
 * Checks config.yaml field by field and lists every problem
 */
@Injectable()
@SubCommand({
  name: 'validate',
  description: 'Validate the config.yaml file structure',
})
export class ConfigValidateCommand extends CommandRunner {
  constructor(
    private readonly configService: ConfigService,
    private readonly storageService: StorageService,
  ) {
    super();
  }

  async run(
    _passedParams: string[],
    options: ConfigValidateOptions,
  ): Promise<void> {
    process.exit(await this.execute(options));
  }

  async execute(options: ConfigValidateOptions): Promise<number> {
    const configPath = options.file ?? this.storageService.getConfigPath();
    console.log(`Validating config file: ${configPath}\n`);

    try {
      const raw = await this.configService.readRawConfig(options.file);
      if (raw === null) {
        logWarning('No config file found; built-in defaults apply.');
        return 0;
      }

      const result = this.configService.validateConfig(raw);
      if (!result.config) {
        const error = new ConfigError(result.errors);
        logFailure(
          `Config file is invalid: ${result.errors.length} error(s)\n`,
        );
        for (const problem of result.errors) {
          console.log(`  ERROR: ${problem.field}: ${problem.message}`);
        }
        console.log('');
        return error.exitCode;
      }

      const { gate } = result.config;
      logSuccess('Config file is valid.\n');
      console.log(`  Version:    ${result.config.version}`);
      console.log(`  Min FPS:    ${gate.minAcceptableFps}`);
      console.log(`  Statistic:  ${gate.statisticUnderTest}`);
      console.log(`  Trim:       ${gate.outlierTrim.strategy}`);
      return 0;
    } catch (error) {
      console.error(`${ICONS.failure} ${formatError(error)}`);
      return getExitCode(error);
    }
  }

  @Option({
    flags: '-f, --file <path>',
    description: 'Path to config.yaml (default: .fps-gate/config.yaml)',
  })
  parseFile(val: string): string {
    return val;
  }
}

/**
 * Config Parent Command
 * Groups config subcommands
 */
@Injectable()
@Command({
  name: 'config',
  description: 'Inspect and validate the gate configuration',
  subCommands: [ConfigShowCommand, ConfigValidateCommand],
})
export class ConfigCommand extends CommandRunner {
  run(): Promise<void> {
    // This is called when no subcommand is provided
    console.log('Configuration\n');
    console.log('Available subcommands:');
    console.log('  show      Print the effective gate configuration');
    console.log('  validate  Validate the config.yaml file structure');
    console.log(
      '\nRun `fps-gate config <subcommand> --help` for more information.\n',
    );
    return Promise.resolve();
  }
}
