import { Module } from '@nestjs/common';
import { EmbeddingModule } from '../embedding/embedding.module';
import { SegmentsModule } from '../segments/segments.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { SearchResultCacheService } from './search-result-cache.service';
import { SearchController } from './search.controller';
import { SearchService } from './search.service';

@Module({
  imports: [EmbeddingModule, VectorIndexModule, SegmentsModule],
  controllers: [SearchController],
  providers: [SearchResultCacheService, SearchService],
  exports: [SearchResultCacheService, SearchService],
})
export class SearchModule {}
