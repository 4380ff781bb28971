export * from './index-segment.dto';
