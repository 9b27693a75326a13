import { test, describe, before, after } from 'node:test';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { LoggerService, ProcessServiceProvider, SpawnError, createServiceConfig } from '../../src/index.js';
import type { ProcessHandle, ServiceConfigInput } from '../../src/index.js';
import { TestAssertions } from '../fixtures/testAssertions.js';
import { waitFor } from '../fixtures/wait.js';

const IDLE = 'setInterval(() => {}, 1000)';
const IGNORE_SIGTERM = "process.on('SIGTERM', () => {}); console.log('ready'); setInterval(() => {}, 1000)";

function nodeService(name: string, script: string, overrides: Partial<ServiceConfigInput> = {}) {
  return createServiceConfig({ name, command: process.execPath, args: ['-e', script], ...overrides });
}

describe('ProcessServiceProvider', () => {
  const logger = new LoggerService({ console: false });
  const provider = new ProcessServiceProvider(logger, 5_000);
  const spawned: ProcessHandle[] = [];
  let dir: string;

  async function spawn(config: ReturnType<typeof nodeService>): Promise<ProcessHandle> {
    const handle = await provider.spawn(config);
    spawned.push(handle);
    return handle;
  }

  before(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'devfleet-provider-'));
  });

  after(async () => {
    for (const handle of spawned) {
      if (!handle.hasExited) {
        handle.signal('SIGKILL');
        await handle.exited;
      }
    }
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('should fail with SpawnError for a missing executable', async () => {
    const config = createServiceConfig({ name: 'ghost', command: 'devfleet-test-no-such-binary' });

    await TestAssertions.assertRejectsWith(provider.spawn(config), SpawnError, "Failed to start 'ghost': spawn devfleet-test-no-such-binary ENOENT");
  });

  test('should fail with SpawnError for a missing working directory', async () => {
    const config = nodeService('lost', IDLE, { workingDir: path.join(dir, 'nowhere') });

    await TestAssertions.assertRejectsWith(provider.spawn(config), SpawnError, 'Working directory does not exist');
  });

  test('should pass environment and working directory to the child', async () => {
    // Arrange
    const config = nodeService('env', 'console.log(process.env.DEVFLEET_TEST_VALUE + " " + process.cwd())', {
      env: { DEVFLEET_TEST_VALUE: 'test-value' },
      workingDir: dir,
    });
    const realDir = await fs.realpath(dir);

    // Act
    const handle = await spawn(config);
    await handle.exited;
    await waitFor(() => logger.getLogs('env').some(record => record.source === 'stdout'));

    // Assert
    const output = logger.getLogs('env').find(record => record.source === 'stdout');
    TestAssertions.assertEqual(output?.message, `test-value ${realDir}`);
  });

  test('should write output to the configured log file', async () => {
    // Arrange
    const logFile = path.join(dir, 'logs', 'writer.log');
    const config = nodeService('writer', "console.log('hello'); console.error('oops')", { logFile });

    // Act
    const handle = await spawn(config);
    const exit = await handle.exited;

    // Assert
    TestAssertions.assertDeepEqual(exit, { code: 0, signal: null });
    TestAssertions.assertEqual(await fs.readFile(logFile, 'utf8'), 'hello\noops\n');
  });

  test('should keep the last output line when it has no trailing newline', async () => {
    // Arrange
    const config = nodeService('partial', "process.stdout.write('first\\nlast'); process.stderr.write('warned')");

    // Act
    const handle = await spawn(config);
    await handle.exited;
    const output = () =>
      logger
        .getLogs('partial')
        .filter(record => record.source === 'stdout' || record.source === 'stderr')
        .map(record => `${record.source} ${record.message}`);
    await waitFor(() => output().length === 3);

    // Assert
    const lines = output();
    TestAssertions.assertArrayContains(lines, 'stdout first');
    TestAssertions.assertArrayContains(lines, 'stdout last');
    TestAssertions.assertArrayContains(lines, 'stderr warned');
  });

  test('should stop a cooperative child with SIGTERM', async () => {
    // Arrange
    const handle = await spawn(nodeService('polite', IDLE));

    // Act
    const outcome = await provider.terminate(handle, { force: false, gracePeriodMs: 5_000 });

    // Assert
    TestAssertions.assertEqual(outcome, 'terminated');
    TestAssertions.assertEqual(handle.exitStatus?.signal, 'SIGTERM');
  });

  test('should not leave the grace timer running after a graceful stop', async () => {
    // Arrange
    const handle = await spawn(nodeService('tidy', IDLE));
    const timers = () => process.getActiveResourcesInfo().filter(resource => resource === 'Timeout').length;
    const before = timers();

    // Act
    const outcome = await provider.terminate(handle, { force: false, gracePeriodMs: 60_000 });

    // Assert
    TestAssertions.assertEqual(outcome, 'terminated');
    TestAssertions.assertEqual(timers(), before);
  });

  test('should escalate to SIGKILL after the grace period', async () => {
    // Arrange
    const handle = await spawn(nodeService('stubborn', IGNORE_SIGTERM));
    await waitFor(() => logger.getLogs('stubborn').some(record => record.message === 'ready'));
    const started = Date.now();

    // Act
    const outcome = await provider.terminate(handle, { force: false, gracePeriodMs: 200 });

    // Assert
    TestAssertions.assertEqual(outcome, 'killed');
    TestAssertions.assertEqual(handle.exitStatus?.signal, 'SIGKILL');
    TestAssertions.assertGreaterThan(Date.now() - started, 150);
  });

  test('should kill immediately when forced', async () => {
    // Arrange
    const handle = await spawn(nodeService('forced', IGNORE_SIGTERM));

    // Act
    const outcome = await provider.terminate(handle, { force: true, gracePeriodMs: 5_000 });

    // Assert
    TestAssertions.assertEqual(outcome, 'killed');
    TestAssertions.assertEqual(handle.exitStatus?.signal, 'SIGKILL');
  });

  test('should report a child that already exited', async () => {
    // Arrange
    const handle = await spawn(nodeService('brief', 'process.exit(0)'));
    await handle.exited;

    // Act
    const outcome = await provider.terminate(handle, { force: false, gracePeriodMs: 5_000 });

    // Assert
    TestAssertions.assertEqual(outcome, 'exited');
  });
});
