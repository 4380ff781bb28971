export * from './detections.dto';
