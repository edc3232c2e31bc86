export { parseMove } from './move-parser.js';
