import { Module } from '@nestjs/common';
import { TextChunkerService } from './text-chunker.service';

/**
 * Chunk Stage Module
 */
@Module({
  providers: [TextChunkerService],
  exports: [TextChunkerService],
})
export class ChunkModule {}
