import { test, describe, before, after } from 'node:test';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { InvalidArgumentError } from 'commander';
import { listLogFiles, resolveLogDir } from '../../src/commands/logs.js';
import { parseLineCount, parseLogFormat, parseLogLevel } from '../../src/commands/options.js';
import { TestAssertions } from '../fixtures/testAssertions.js';

describe('logs command', () => {
  let dir: string;

  before(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'devfleet-logs-'));
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('listLogFiles', () => {
    test('should list .log files sorted by service name', async () => {
      // Arrange
      const logDir = path.join(dir, 'listing');
      await fs.mkdir(logDir);
      await Promise.all(
        ['web.log', 'api.log', 'api.log.old', 'notes.txt'].map(name => fs.writeFile(path.join(logDir, name), ''))
      );

      // Act
      const files = listLogFiles(logDir);

      // Assert
      TestAssertions.assertDeepEqual(files, [
        { service: 'api', path: path.join(logDir, 'api.log') },
        { service: 'web', path: path.join(logDir, 'web.log') },
      ]);
    });

    test('should return nothing for a missing directory', () => {
      TestAssertions.assertDeepEqual(listLogFiles(path.join(dir, 'absent')), []);
    });
  });

  describe('resolveLogDir', () => {
    test('should prefer an explicit directory', () => {
      TestAssertions.assertEqual(resolveLogDir({ dir: path.join(dir, 'explicit') }), path.join(dir, 'explicit'));
    });

    test('should take the directory from the manifest', async () => {
      // Arrange
      const manifestPath = path.join(dir, 'devfleet.json');
      await fs.writeFile(manifestPath, JSON.stringify({ logDir: 'output', services: {} }));

      // Act
      const logDir = resolveLogDir({ manifest: manifestPath });

      // Assert
      TestAssertions.assertEqual(logDir, path.join(dir, 'output'));
    });
  });

  describe('option parsers', () => {
    test('should parse line counts', () => {
      TestAssertions.assertEqual(parseLineCount('25'), 25);
      TestAssertions.assertEqual(parseLineCount('0'), 0);
      TestAssertions.assertThrowsWith(() => parseLineCount('-1'), InvalidArgumentError, 'non-negative integer');
      TestAssertions.assertThrowsWith(() => parseLineCount('12abc'), InvalidArgumentError, 'non-negative integer');
    });

    test('should parse levels and formats case-insensitively', () => {
      TestAssertions.assertEqual(parseLogLevel('WARN'), 'warn');
      TestAssertions.assertEqual(parseLogFormat('Json'), 'json');
      TestAssertions.assertThrowsWith(
        () => parseLogLevel('fatal'),
        InvalidArgumentError,
        'Expected one of trace, debug, info, warn, error.'
      );
      TestAssertions.assertThrowsWith(() => parseLogFormat('xml'), InvalidArgumentError, 'Expected one of pretty, json, raw.');
    });
  });
});
