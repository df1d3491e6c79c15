import { ConfigService } from '@nestjs/config';
import * as os from 'os';
import * as path from 'path';
import type { AppConfig } from '../../../src/config/configuration';
import type {
  ParticipantRecord,
  SessionRecord,
} from '../../../src/shared/interfaces/session-record.interface';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';

/**
 * Factories shared by the unit specs. Services are built directly with these,
 * without the Nest testing module.
 */

export function createTestAppConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: 'test',
    port: 8000,
    host: '127.0.0.1',
    logLevel: 'silent',
    corsOrigin: '*',
    sessionsApi: {
      url: 'https://sessions.example.test/v2/sessions/',
      pageSize: 20,
      pageDelayMs: 0,
      timeoutMs: 1000,
    },
    reports: {
      tempDir: path.join(os.tmpdir(), 'usage-report-tests'),
    },
    ...overrides,
  };
}

export function createTestConfigService(overrides: Partial<AppConfig> = {}): ConfigService<AppConfig> {
  return new ConfigService<AppConfig>({ ...createTestAppConfig(overrides) });
}

/**
 * Real pino logger at level `silent`.
 */
export function createSilentLogger(): PinoLoggerService {
  return new PinoLoggerService(createTestConfigService());
}

export function buildParticipant(
  participantId: string,
  name: string,
  timelog: Array<{ start?: unknown; end?: unknown }> = [],
): ParticipantRecord {
  return { participantId, name, timelog };
}

export function buildSession(
  id: string,
  participants: ParticipantRecord[] = [],
  fields: Partial<SessionRecord> = {},
): SessionRecord {
  return {
    id,
    roomId: `room-${id}`,
    start: '2024-03-01T10:00:00.000Z',
    end: '2024-03-01T11:00:00.000Z',
    status: 'completed',
    participants,
    ...fields,
  };
}

export function buildSessions(count: number, prefix = 'session'): SessionRecord[] {
  return Array.from({ length: count }, (_, index) => buildSession(`${prefix}-${index + 1}`));
}

/**
 * Resolves once `predicate` holds, polling on the macrotask queue.
 */
export async function waitFor(
  predicate: () => boolean | Promise<boolean>,
  { timeoutMs = 2000, intervalMs = 5 } = {},
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
