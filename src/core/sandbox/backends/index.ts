import type { Settings } from '../../../config/settings.js';
import type { SandboxBackend } from '../types.js';
import { DockerBackend } from './docker.js';
import { LocalBackend } from './local.js';

export { DockerBackend, type DockerBackendOptions } from './docker.js';
export { LocalBackend, type LocalBackendOptions } from './local.js';
export { BackendFaultError, TIMEOUT_EXIT_CODE, runProcess } from './process.js';

export function createBackend(settings: Settings): SandboxBackend {
  switch (settings.sandbox.backend) {
    case 'docker':
      return new DockerBackend(settings.sandbox.docker);
    case 'local':
      return new LocalBackend();
  }
}
