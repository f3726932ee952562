// ---------------------------------------------------------------------------
// PrioBus — Core Type Barrel
// ---------------------------------------------------------------------------

export * from './events';
export * from './logger';
export * from './config';
