/**
 * Embed Stage Module
 */

import { Module } from '@nestjs/common';
import { ProvidersModule } from '../../providers/providers.module';
import { EmbeddingIndexService } from './embedding-index.service';

@Module({
  imports: [ProvidersModule],
  providers: [EmbeddingIndexService],
  exports: [EmbeddingIndexService],
})
export class EmbedModule {}
