export * from './anomaly.dto';
