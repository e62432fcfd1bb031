/**
 * Database module public API exports.
 */
export { DatabaseService } from './services/database.service.js';
