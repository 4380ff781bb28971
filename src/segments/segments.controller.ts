import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  ParseFilePipe,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { SegmentFileValidator } from '../common/validators';
import { IndexSegmentBatchDto, IndexSegmentDto } from './dto';
import {
  RegisteredSegment,
  RemoveSegmentResult,
} from './interfaces/segment.interface';
import { SegmentIndexService } from './segment-index.service';
import { toSegment } from './segment.mapper';
import { SegmentRegistryService } from './segment-registry.service';

export const MAX_SEGMENT_BYTES = 256 * 1024 * 1024;

/**
 * Controller for indexing segments into the similarity index
 */
@Controller('segments')
export class SegmentsController {
  private readonly logger = new Logger(SegmentsController.name);

  constructor(
    private readonly segmentIndexService: SegmentIndexService,
    private readonly registry: SegmentRegistryService,
  ) {}

  /**
   * Index an uploaded segment file with its metadata
   */
  @Post('index')
  @UseInterceptors(FileInterceptor('segment', { storage: memoryStorage() }))
  async indexSegment(
    @UploadedFile(
      new ParseFilePipe({
        validators: [new SegmentFileValidator({ maxSize: MAX_SEGMENT_BYTES })],
      }),
    )
    file: Express.Multer.File,
    @Body() dto: IndexSegmentDto,
  ) {
    const segment = toSegment(dto);
    return this.segmentIndexService.indexSegment(segment, {
      data: file.buffer,
      mimeType: file.mimetype,
    });
  }

  /**
   * Index a batch of segments with inline content
   */
  @Post('index/batch')
  @HttpCode(HttpStatus.OK)
  async indexBatch(@Body() dto: IndexSegmentBatchDto) {
    const requests = dto.segments.map((item) => ({
      segment: toSegment(item),
      content: {
        data: Buffer.from(item.contentBase64, 'base64'),
        mimeType: item.mimeType,
      },
    }));

    this.logger.log(`Batch index request with ${requests.length} segments`);
    const results = await this.segmentIndexService.indexBatch(requests);
    return {
      total: results.length,
      indexed: results.filter((r) => r.status === 'indexed').length,
      queued: results.filter((r) => r.status === 'queued').length,
      failed: results.filter((r) => r.status === 'failed').length,
      results,
    };
  }

  /**
   * Retry segments queued while the index was full
   */
  @Post('retry')
  @HttpCode(HttpStatus.OK)
  async retryQueued() {
    return this.segmentIndexService.retryQueued();
  }

  @Get()
  listSegments() {
    return {
      count: this.registry.count(),
      queuedForRetry: this.segmentIndexService.queuedCount(),
      segments: this.registry.list(),
    };
  }

  @Get(':id')
  getSegment(@Param('id') id: string): RegisteredSegment {
    const registered = this.registry.get(id);
    if (!registered) {
      throw new NotFoundException(`Segment ${id} is not indexed`);
    }
    return registered;
  }

  /**
   * Remove an indexed or queued segment
   */
  @Delete(':id')
  async removeSegment(@Param('id') id: string): Promise<RemoveSegmentResult> {
    return this.segmentIndexService.removeSegment(id);
  }
}
