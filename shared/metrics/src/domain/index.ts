export * from './metrics-collector.interface';
export * from './models';
