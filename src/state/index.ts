export * from './types';
export { initDatabase, getDatabase, closeDatabase, saveDatabase } from './database';
export { runService, RunService } from './run-service';
export { domainService, DomainService } from './domain-service';
export { scanService, ScanService } from './scan-service';
export type { ScanStats } from './scan-service';
export { rotationService, RotationService } from './rotation-service';
