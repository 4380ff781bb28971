import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { SearchFilters } from '../vector-index/filters';
import { SearchDto, SearchFiltersDto } from './dto';
import { SearchResponse } from './interfaces/search.interface';
import { SearchService } from './search.service';

function parseInstant(value: string | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new BadRequestException(`${field} is not a valid timestamp`);
  }
  return parsed;
}

export function toSearchFilters(dto?: SearchFiltersDto): SearchFilters {
  if (!dto) return {};
  return {
    cameraId: dto.cameraId,
    location: dto.location,
    videoId: dto.videoId,
    timeRange: dto.timeRange && {
      from: parseInstant(dto.timeRange.from, 'timeRange.from'),
      to: parseInstant(dto.timeRange.to, 'timeRange.to'),
    },
    contentFlags: dto.contentFlags && { ...dto.contentFlags },
  };
}

@Controller('search')
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  /**
   * Natural-language search over indexed segments. Closing the connection
   * cancels the search.
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async search(
    @Body() dto: SearchDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<SearchResponse> {
    const controller = new AbortController();
    // the response closing before it was written means the caller left
    const onClose = () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      return await this.searchService.search(
        {
          query: dto.query,
          filters: toSearchFilters(dto.filters),
          topK: dto.topK ?? 10,
          scoreThreshold: dto.scoreThreshold ?? 0.5,
        },
        controller.signal,
      );
    } finally {
      res.off('close', onClose);
    }
  }
}
