import { Logger } from '@nestjs/common';
import { vi } from 'vitest';

process.env.NODE_ENV = 'test';

// Use cases log through Nest's static logger
Logger.overrideLogger(false);

// Increase timeout for async operations
vi.setConfig({ testTimeout: 10000 });
