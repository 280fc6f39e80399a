export { ScriptHandler } from './script-handler.js';
