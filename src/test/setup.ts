import { vi, beforeEach } from 'vitest';
import { configureLogging, getGlobalLogger } from '../main/logger';

// Buffer everything, write nowhere
configureLogging({ minLevel: 'debug', logDir: null, stderr: false });

beforeEach(() => {
  vi.clearAllMocks();
  getGlobalLogger().reset();
});
