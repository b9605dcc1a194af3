export * from './dashboard.api';
export type * from './dashboard.api-model';
