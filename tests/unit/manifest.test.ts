import { test, describe, before, after } from 'node:test';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ManifestError, loadManifest, parseManifest, selectServices } from '../../src/config/manifest.js';
import { TestAssertions } from '../fixtures/testAssertions.js';

describe('Workspace manifest', () => {
  let dir: string;
  let manifestPath: string;

  before(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'devfleet-manifest-'));
    manifestPath = path.join(dir, 'devfleet.json');
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('parseManifest', () => {
    test('should convert services with seconds to milliseconds and resolve paths', () => {
      // Arrange
      const document = {
        logDir: 'var/log',
        services: {
          api: {
            command: 'npm',
            args: ['run', 'dev'],
            cwd: 'services/api',
            env: { PORT: 3000, DEBUG: 'api:*' },
            ports: ['3000'],
            restartPolicy: 'on-failure',
            startupTimeout: 45,
            maxRestarts: 5,
            healthCheck: { url: 'http://localhost:3000/health', interval: 2.5, timeout: 1, retries: 4 },
          },
        },
      };

      // Act
      const manifest = parseManifest(document, manifestPath);

      // Assert
      TestAssertions.assertEqual(manifest.rootDir, dir);
      TestAssertions.assertEqual(manifest.logDir, path.join(dir, 'var', 'log'));
      TestAssertions.assertArrayLength(manifest.services, 1);
      TestAssertions.assertDeepEqual(manifest.services[0], {
        name: 'api',
        command: 'npm',
        args: ['run', 'dev'],
        env: { PORT: '3000', DEBUG: 'api:*' },
        workingDir: path.join(dir, 'services', 'api'),
        startupTimeoutMs: 45_000,
        restartPolicy: 'on-failure',
        logFile: path.join(dir, 'var', 'log', 'api.log'),
        maxRestarts: 5,
        ports: ['3000'],
        healthCheck: {
          url: 'http://localhost:3000/health',
          command: undefined,
          intervalMs: 2_500,
          timeoutMs: 1_000,
          retries: 4,
        },
      });
    });

    test('should apply defaults for a minimal service', () => {
      // Act
      const manifest = parseManifest({ services: { worker: { command: 'node', log: false } } }, manifestPath);

      // Assert
      const [worker] = manifest.services;
      TestAssertions.assertEqual(manifest.logDir, path.join(dir, '.logs'));
      TestAssertions.assertEqual(worker.workingDir, dir);
      TestAssertions.assertEqual(worker.restartPolicy, 'never');
      TestAssertions.assertEqual(worker.startupTimeoutMs, undefined);
      TestAssertions.assertEqual(worker.logFile, undefined);
      TestAssertions.assertEqual(worker.healthCheck, undefined);
    });

    const invalid: [string, unknown, string][] = [
      ['a non-object root', [], '(root) must be an object'],
      ['missing services', {}, 'services must be an object'],
      ['a missing command', { services: { api: {} } }, 'services.api.command must be a string'],
      ['non-string args', { services: { api: { command: 'node', args: ['ok', 1] } } }, 'services.api.args[1] must be a string'],
      [
        'an unknown restart policy',
        { services: { api: { command: 'node', restartPolicy: 'sometimes' } } },
        "services.api.restartPolicy must be one of never, on-failure, always, unless-stopped, got 'sometimes'",
      ],
      [
        'a health check without target',
        { services: { api: { command: 'node', healthCheck: { interval: 5 } } } },
        "Service 'api': health check must specify either url or command",
      ],
      [
        'a string interval',
        { services: { api: { command: 'node', healthCheck: { url: 'http://x', interval: '5s' } } } },
        'services.api.healthCheck.interval must be a number',
      ],
    ];

    for (const [label, document, message] of invalid) {
      test(`should reject ${label}`, () => {
        TestAssertions.assertThrowsWith(() => parseManifest(document, manifestPath), ManifestError, `${manifestPath}: ${message}`);
      });
    }
  });

  describe('loadManifest', () => {
    test('should read services from disk in declaration order', async () => {
      // Arrange
      await fs.writeFile(
        manifestPath,
        JSON.stringify({ services: { db: { command: 'postgres' }, api: { command: 'node', args: ['server.js'] } } })
      );

      // Act
      const manifest = loadManifest(manifestPath);

      // Assert
      TestAssertions.assertEqual(manifest.path, manifestPath);
      TestAssertions.assertDeepEqual(
        manifest.services.map(service => service.name),
        ['db', 'api']
      );
    });

    test('should report invalid JSON', async () => {
      // Arrange
      const brokenPath = path.join(dir, 'broken.json');
      await fs.writeFile(brokenPath, '{ "services": ');

      // Act & Assert
      TestAssertions.assertThrowsWith(() => loadManifest(brokenPath), ManifestError, `${brokenPath}: invalid JSON`);
    });

    test('should report a missing file', () => {
      const missingPath = path.join(dir, 'missing.json');

      TestAssertions.assertThrowsWith(() => loadManifest(missingPath), ManifestError, `${missingPath}: cannot read manifest`);
    });
  });

  describe('selectServices', () => {
    const manifest = () =>
      parseManifest({ services: { db: { command: 'db' }, api: { command: 'api' }, web: { command: 'web' } } }, '/work/devfleet.json');

    test('should return every service for an empty selection', () => {
      TestAssertions.assertArrayLength(selectServices(manifest(), []), 3);
    });

    test('should keep manifest order for a selection', () => {
      TestAssertions.assertDeepEqual(
        selectServices(manifest(), ['web', 'db']).map(service => service.name),
        ['db', 'web']
      );
    });

    test('should reject unknown names', () => {
      TestAssertions.assertThrowsWith(
        () => selectServices(manifest(), ['api', 'cache', 'queue']),
        ManifestError,
        'unknown service(s): cache, queue'
      );
    });
  });
});
