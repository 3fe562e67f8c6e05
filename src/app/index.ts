export { FontControlApp } from './font-app.js';
export type { FontControlAppOptions } from './font-app.js';
