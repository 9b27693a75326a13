import { test, describe } from 'node:test';
import { parseLevel, parseLogLine } from '../../src/index.js';
import { TestAssertions } from '../fixtures/testAssertions.js';

const NOW = new Date('2030-06-01T12:00:00.000Z');
const now = () => NOW;

describe('parseLogLine', () => {
  describe('JSON lines', () => {
    test('should extract timestamp, level and message and keep the rest as fields', () => {
      // Arrange
      const line = '{"timestamp":"2024-01-15T10:30:00Z","level":"error","message":"boom","port":8080}';

      // Act
      const entry = parseLogLine(line, 'api', now);

      // Assert
      TestAssertions.assertDefined(entry);
      TestAssertions.assertEqual(entry.timestamp.toISOString(), '2024-01-15T10:30:00.000Z');
      TestAssertions.assertEqual(entry.service, 'api');
      TestAssertions.assertEqual(entry.level, 'error');
      TestAssertions.assertEqual(entry.message, 'boom');
      TestAssertions.assertDeepEqual(entry.fields, { port: 8080 });
      TestAssertions.assertEqual(entry.raw, line);
    });

    test('should accept msg and severity aliases', () => {
      // Act
      const entry = parseLogLine('{"severity":"WARNING","msg":"slow query","ms":1200}', 'db', now);

      // Assert
      TestAssertions.assertDefined(entry);
      TestAssertions.assertEqual(entry.level, 'warn');
      TestAssertions.assertEqual(entry.message, 'slow query');
      TestAssertions.assertEqual(entry.timestamp, NOW);
      TestAssertions.assertDeepEqual(entry.fields, { ms: 1200 });
    });

    test('should read numeric levels and epoch timestamps', () => {
      // Act
      const millis = parseLogLine('{"level":30,"time":1700000000000,"msg":"ready"}', 'api', now);
      const seconds = parseLogLine('{"level":50,"ts":1700000000,"msg":"crash"}', 'api', now);

      // Assert
      TestAssertions.assertDefined(millis);
      TestAssertions.assertDefined(seconds);
      TestAssertions.assertEqual(millis.level, 'info');
      TestAssertions.assertEqual(millis.timestamp.getTime(), 1_700_000_000_000);
      TestAssertions.assertEqual(seconds.level, 'error');
      TestAssertions.assertEqual(seconds.timestamp.getTime(), 1_700_000_000_000);
    });

    test('should fall back to the raw line when message is not a string', () => {
      // Act
      const entry = parseLogLine('{"message":42,"level":"debug"}', 'api', now);

      // Assert
      TestAssertions.assertDefined(entry);
      TestAssertions.assertEqual(entry.message, '{"message":42,"level":"debug"}');
      TestAssertions.assertEqual(entry.level, 'debug');
    });

    test('should ignore timestamps that are not RFC 3339', () => {
      // Act
      const entry = parseLogLine('{"timestamp":"yesterday","message":"hi"}', 'api', now);

      // Assert
      TestAssertions.assertDefined(entry);
      TestAssertions.assertEqual(entry.timestamp, NOW);
    });
  });

  describe('text lines', () => {
    test('should read a leading timestamp and bracketed level', () => {
      // Act
      const entry = parseLogLine('2024-01-15 10:30:00 [ERROR] Connection failed', 'api', now);

      // Assert
      TestAssertions.assertDefined(entry);
      TestAssertions.assertEqual(entry.timestamp.getTime(), Date.UTC(2024, 0, 15, 10, 30, 0));
      TestAssertions.assertEqual(entry.level, 'error');
      TestAssertions.assertEqual(entry.message, '2024-01-15 10:30:00 [ERROR] Connection failed');
      TestAssertions.assertDeepEqual(entry.fields, {});
    });

    test('should match level keywords case-insensitively as whole words', () => {
      // Act
      const warning = parseLogLine('warning: disk almost full', 'api', now);
      const partial = parseLogLine('DEBUGGING session attached', 'api', now);

      // Assert
      TestAssertions.assertEqual(warning?.level, 'warn');
      TestAssertions.assertEqual(partial?.level, 'info');
    });

    test('should default to info and now for plain text', () => {
      // Act
      const entry = parseLogLine('  listening on port 3000  ', 'web', now);

      // Assert
      TestAssertions.assertDefined(entry);
      TestAssertions.assertEqual(entry.level, 'info');
      TestAssertions.assertEqual(entry.timestamp, NOW);
      TestAssertions.assertEqual(entry.message, 'listening on port 3000');
      TestAssertions.assertEqual(entry.raw, 'listening on port 3000');
    });

    test('should treat malformed JSON and arrays as text', () => {
      // Act
      const broken = parseLogLine('{"level":"error"', 'api', now);
      const array = parseLogLine('["error"]', 'api', now);

      // Assert
      TestAssertions.assertEqual(broken?.message, '{"level":"error"');
      TestAssertions.assertEqual(broken?.level, 'error');
      TestAssertions.assertEqual(array?.message, '["error"]');
      TestAssertions.assertDeepEqual(array?.fields, {});
    });

    test('should return null for blank lines', () => {
      TestAssertions.assertEqual(parseLogLine('', 'api', now), null);
      TestAssertions.assertEqual(parseLogLine(' \t ', 'api', now), null);
    });
  });
});

describe('parseLevel', () => {
  test('should map known names and default the rest to info', () => {
    TestAssertions.assertEqual(parseLevel('TRACE'), 'trace');
    TestAssertions.assertEqual(parseLevel('Warning'), 'warn');
    TestAssertions.assertEqual(parseLevel('error'), 'error');
    TestAssertions.assertEqual(parseLevel('fatal'), 'info');
  });
});
