import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from './../src/app.module.js';
import { AnalyzeCommand } from './../src/commands/analyze.command.js';
import { InitCommand } from './../src/commands/init.command.js';
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from './../src/commands/config.command.js';

describe('AppModule (e2e)', () => {
  let moduleFixture: TestingModule;

  beforeEach(async () => {
    moduleFixture = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();
  });

  afterEach(async () => {
    await moduleFixture.close();
  });

  it('should compile the AppModule successfully', () => {
    expect(moduleFixture).toBeDefined();
  });

  it('should resolve every command with its dependencies', () => {
    expect(moduleFixture.get(AnalyzeCommand)).toBeInstanceOf(AnalyzeCommand);
    expect(moduleFixture.get(InitCommand)).toBeInstanceOf(InitCommand);
    expect(moduleFixture.get(ConfigShowCommand)).toBeInstanceOf(
      ConfigShowCommand,
    );
    expect(moduleFixture.get(ConfigValidateCommand)).toBeInstanceOf(
      ConfigValidateCommand,
    );
  });
});
