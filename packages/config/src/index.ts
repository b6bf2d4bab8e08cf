/**
 * @hunkwise/config - configuration schema and YAML storage
 */

export * from './configSchema.js';
export * from './configIO.js';
export * from './configValues.js';
