export { getPreference, setPreference, removePreference } from './preference-queries.js';
