import * as path from 'path';
import { Test, TestingModule } from '@nestjs/testing';
import { ReporterService } from './reporter.service.js';
import { ReporterModule } from './reporter.module.js';
import { ServicesModule } from '../services/services.module.js';
import { StorageService } from '../services/storage.service.js';
import { JsonFileReportSink } from './report-sinks.js';

describe('ReporterService', () => {
  let module: TestingModule;
  let service: ReporterService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [ServicesModule, ReporterModule],
    })
      .overrideProvider(StorageService)
      .useValue(new StorageService({ baseDir: '/tmp/fps-gate-unused' }))
      .compile();

    service = module.get<ReporterService>(ReporterService);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('createJsonFileSink', () => {
    it('should place relative paths in the reports directory', () => {
      const sink = service.createJsonFileSink('gate.json', 'out/reports');

      expect(sink).toBeInstanceOf(JsonFileReportSink);
      expect(sink.outputPath).toBe(path.join('out/reports', 'gate.json'));
    });

    it('should keep absolute paths', () => {
      const target = path.resolve('/var/ci/gate.json');

      expect(service.createJsonFileSink(target, 'out/reports').outputPath).toBe(
        target,
      );
    });
  });
});
