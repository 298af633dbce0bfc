export { createDefaultSettings, createSettings, applyOverrides } from './config';
export { validateSettings, provisionSettingsSchema } from './validation';
export * from './defaults';
export type * from './types';
