import { defineShellConfig } from '../shared/shell-config.js';
import { InterceptionWorker } from '../worker/interception-worker.js';
import type { WorkerScope } from '../worker/host.js';

// Shadows the page-typed global with the worker surface we use.
declare const self: WorkerScope;

// Bump a version token to force clients onto a fresh partition.
const config = defineShellConfig({
  staticVersion: 'v1',
  dynamicVersion: 'v1',
});

new InterceptionWorker(self, config).attach();
