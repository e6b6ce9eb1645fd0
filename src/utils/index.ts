export { parseWindow, formatDuration } from './parse-window.js';
