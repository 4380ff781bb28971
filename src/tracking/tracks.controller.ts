import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { AnomalyEngineService } from '../anomalies/anomaly-engine.service';
import { Anomaly } from '../anomalies/interfaces/anomaly.interface';
import { toSegment } from '../segments/segment.mapper';
import { FlushStreamDto, IngestDetectionsDto, ListTracksQueryDto } from './dto';
import {
  CorrelatorInput,
  CorrelatorUpdate,
  StationaryObject,
  Track,
} from './interfaces/track.interface';
import { TrackCorrelatorService } from './track-correlator.service';

function toEpoch(value?: string): number | undefined {
  return value === undefined ? undefined : Date.parse(value);
}

export function toCorrelatorInputs(dto: IngestDetectionsDto): CorrelatorInput[] {
  const detections: CorrelatorInput[] = dto.detections.map((d): CorrelatorInput => ({
    kind: 'detection',
    cameraId: d.cameraId,
    timestamp: Date.parse(d.timestamp),
    position: { x: d.position.x, y: d.position.y },
    appearance: [...d.appearance],
    segmentId: d.segmentId,
    location: d.location,
  }));
  const objects: CorrelatorInput[] = (dto.objects ?? []).map((o): CorrelatorInput => ({
    kind: 'object',
    objectId: o.objectId,
    cameraId: o.cameraId,
    timestamp: Date.parse(o.timestamp),
    position: { x: o.position.x, y: o.position.y },
    ownerTrackId: o.ownerTrackId,
    segmentId: o.segmentId,
    location: o.location,
  }));
  return [...detections, ...objects];
}

/**
 * Detection intake and read-only track views for cross-camera display
 */
@Controller('tracks')
export class TracksController {
  constructor(
    private readonly correlator: TrackCorrelatorService,
    private readonly anomalyEngine: AnomalyEngineService,
  ) {}

  @Post('streams/:streamId/detections')
  @HttpCode(HttpStatus.OK)
  ingest(
    @Param('streamId') streamId: string,
    @Body() dto: IngestDetectionsDto,
  ): CorrelatorUpdate & { anomalies: Anomaly[] } {
    const segmentAnomalies = (dto.segments ?? []).flatMap((fields) =>
      this.anomalyEngine.recordSegment(toSegment(fields)),
    );
    const update = this.correlator.ingest(streamId, toCorrelatorInputs(dto));
    return {
      ...update,
      anomalies: [...segmentAnomalies, ...this.evaluate(streamId)],
    };
  }

  /**
   * Release the reorder buffer, close tracks that timed out by `now` and
   * evaluate what changed
   */
  @Post('streams/:streamId/flush')
  @HttpCode(HttpStatus.OK)
  flush(
    @Param('streamId') streamId: string,
    @Body() dto: FlushStreamDto,
  ): CorrelatorUpdate & { anomalies: Anomaly[] } {
    const update = this.correlator.flush(streamId, toEpoch(dto.now));
    return { ...update, anomalies: this.evaluate(streamId) };
  }

  @Get()
  list(@Query() query: ListTracksQueryDto): Track[] {
    return this.correlator.listTracks({
      streamId: query.streamId,
      cameraId: query.cameraId,
      state: query.state,
      from: toEpoch(query.from),
      to: toEpoch(query.to),
    });
  }

  @Get('objects')
  listObjects(@Query('streamId') streamId?: string): StationaryObject[] {
    return this.correlator.listObjects(streamId);
  }

  @Get(':id')
  get(@Param('id') id: string): Track {
    const track = this.correlator.getTrack(id);
    if (!track) {
      throw new NotFoundException(`Track ${id} not found`);
    }
    return track;
  }

  private evaluate(streamId: string): Anomaly[] {
    const { tracks, objects, clock } = this.correlator.streamSnapshot(streamId);
    if (clock === null) return [];
    return this.anomalyEngine.evaluateStream({
      streamId,
      tracks,
      objects,
      now: clock,
    });
  }
}
