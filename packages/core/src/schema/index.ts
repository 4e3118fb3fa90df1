export { tasks } from './tasks.js';
export { completions } from './completions.js';
export { categories } from './categories.js';
export { config } from './config.js';
