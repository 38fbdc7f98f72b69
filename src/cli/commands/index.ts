export { queryCommand } from './query.js';
export { checkCommand } from './check.js';
