/**
 * Main step entry, bundled as dist/main/index.js.
 */

import { run } from './main';

void run();
