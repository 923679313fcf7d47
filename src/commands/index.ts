export { CommandBuilder, escapeString } from './builder.js';
