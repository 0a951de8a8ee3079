export { allocateCapture, getCaptureFiles, MAX_CAPTURE_CANDIDATES } from './store.js';
export { createChompStream } from './chomp.js';
