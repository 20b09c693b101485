export { HistoryBuffer } from './HistoryBuffer.js';
export type { HistoryWindow } from './HistoryBuffer.js';
