export { registerReport } from './report.js';
export { registerRemove } from './remove.js';
export { registerConfig } from './config.js';
export { registerVersion } from './version.js';
