export * from './abandonment.detector';
export * from './after-hours.detector';
export * from './crowd-formation.detector';
export * from './loitering.detector';
export * from './unusual-movement.detector';
