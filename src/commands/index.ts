/**
 * Command re-exports
 */

export { importCommand } from './import.js';
