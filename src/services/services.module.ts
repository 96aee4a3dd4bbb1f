import { Module, Global } from '@nestjs/common';
import { StorageService } from './storage.service.js';
import { ConfigService } from './config.service.js';

@Global()
@Module({
  providers: [
    {
      provide: StorageService,
      useFactory: () => new StorageService(),
    },
    ConfigService,
  ],
  exports: [StorageService, ConfigService],
})
export class ServicesModule {}
