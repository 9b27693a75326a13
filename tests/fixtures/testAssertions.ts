import assert from 'node:assert';
import { access } from 'node:fs/promises';

export class TestAssertions {
  static assertEqual<T>(actual: T, expected: T, message?: string): void {
    assert.strictEqual(actual, expected, message);
  }

  static assertDeepEqual<T>(actual: T, expected: T, message?: string): void {
    assert.deepStrictEqual(actual, expected, message);
  }

  static assertTrue(condition: boolean, message?: string): void {
    assert.ok(condition, message);
  }

  static assertArrayLength<T>(array: T[], expectedLength: number, message?: string): void {
    assert.strictEqual(array.length, expectedLength, message);
  }

  static async assertMissing(filePath: string): Promise<void> {
    await assert.rejects(access(filePath), { code: 'ENOENT' });
  }

  static assertThrowsWith(run: () => unknown, errorClass: new (...args: never[]) => Error, messagePart?: string): void {
    assert.throws(run, (error: unknown) => {
      if (!(error instanceof errorClass)) {
        assert.fail(`Expected ${errorClass.name}, got ${String(error)}`);
      }
      if (messagePart !== undefined) {
        assert.ok(error.message.includes(messagePart), `Expected '${error.message}' to contain '${messagePart}'`);
      }
      return true;
    });
  }
}
