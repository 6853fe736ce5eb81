export { preferences } from './preferences.js';
