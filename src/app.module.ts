/**
 * Application Root Module
 *
 * - ServicesModule: global storage and config services
 * - CommandsModule: CLI commands (init, analyze, config); imports the
 *   AnalyzerModule pipeline and the ReporterModule
 */

import { Module } from '@nestjs/common';
import { ServicesModule } from './services/services.module.js';
import { CommandsModule } from './commands/commands.module.js';

@Module({
  imports: [
    // Global shared services - must be imported first
    ServicesModule,
    CommandsModule,
  ],
})
export class AppModule {}
