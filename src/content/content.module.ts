import { Global, Module } from '@nestjs/common';
import { COMBAT_CONTENT } from './combat-content.js';
import { ContentLoaderService } from './content-loader.service.js';

@Global()
@Module({
  providers: [
    ContentLoaderService,
    { provide: COMBAT_CONTENT, useExisting: ContentLoaderService },
  ],
  exports: [ContentLoaderService, COMBAT_CONTENT],
})
export class ContentModule {}
