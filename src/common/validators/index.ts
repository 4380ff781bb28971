export * from './segment-file.validator';
