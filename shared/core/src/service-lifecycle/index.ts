export {
  setupServiceShutdown,
  runServiceMain,
  closeServer,
} from './service-bootstrap';
export type {
  ServiceShutdownConfig,
  ServiceShutdownCleanup,
  RunServiceMainConfig,
} from './service-bootstrap';
