/**
 * Poller Entry Point
 *
 * Dedicated entry file that unconditionally calls main(). The spawn
 * helper starts it as a detached child of the pre step.
 *
 * Bundled as: dist/poller/index.js
 */

import { main } from './poller/run';

main().catch((err: unknown) => {
  console.error('Poller error:', err);
  process.exit(1);
});
