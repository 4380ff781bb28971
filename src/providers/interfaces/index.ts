export * from './embedding-provider.interface';
