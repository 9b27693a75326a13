import fs from 'fs';
import path from 'path';
import {
  ConfigError,
  RESTART_POLICIES,
  createServiceConfig,
  describeError,
  validateServiceConfig,
} from '../../packages/service-manager/src/index.js';
import type {
  HealthCheck,
  RestartPolicy,
  ServiceConfig,
  ServiceConfigInput,
} from '../../packages/service-manager/src/index.js';

export const MANIFEST_FILE = 'devfleet.json';
export const DEFAULT_LOG_DIR = '.logs';

export class ManifestError extends ConfigError {
  constructor(
    readonly manifestPath: string,
    message: string
  ) {
    super(`${manifestPath}: ${message}`);
  }
}

export interface Manifest {
  path: string;
  rootDir: string;
  logDir: string;
  services: ServiceConfig[];
}

type JsonObject = Record<string, unknown>;

/**
 * Reads a workspace manifest and turns every entry under `services` into a
 * validated {@link ServiceConfig}. Durations in the file are seconds; relative
 * `cwd` and `logDir` resolve against the manifest's directory.
 */
export function loadManifest(manifestPath: string = path.join(process.cwd(), MANIFEST_FILE)): Manifest {
  const resolved = path.resolve(manifestPath);

  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new ManifestError(resolved, `cannot read manifest: ${describeError(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ManifestError(resolved, `invalid JSON: ${describeError(error)}`);
  }

  return parseManifest(parsed, resolved);
}

export function parseManifest(document: unknown, manifestPath: string): Manifest {
  const rootDir = path.dirname(manifestPath);
  const reader = new FieldReader(manifestPath);

  const root = reader.object(document, '(root)');
  const logDir = path.resolve(rootDir, reader.optionalString(root, 'logDir', 'logDir') ?? DEFAULT_LOG_DIR);
  const servicesNode = reader.object(root.services, 'services');

  const services = Object.entries(servicesNode).map(([name, node]) => {
    const config = createServiceConfig(readService(reader, name, node, rootDir, logDir));
    try {
      validateServiceConfig(config);
    } catch (error) {
      throw new ManifestError(manifestPath, describeError(error));
    }
    return config;
  });

  return { path: manifestPath, rootDir, logDir, services };
}

/**
 * Picks the named services in manifest order; an empty selection means all of them.
 */
export function selectServices(manifest: Manifest, names: string[]): ServiceConfig[] {
  if (names.length === 0) {
    return manifest.services;
  }

  const known = new Set(manifest.services.map(service => service.name));
  const unknown = names.filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw new ManifestError(manifest.path, `unknown service(s): ${unknown.join(', ')}`);
  }

  const wanted = new Set(names);
  return manifest.services.filter(service => wanted.has(service.name));
}

function readService(reader: FieldReader, name: string, node: unknown, rootDir: string, logDir: string): ServiceConfigInput {
  const at = `services.${name}`;
  const service = reader.object(node, at);

  const cwd = reader.optionalString(service, 'cwd', `${at}.cwd`);
  const startupTimeout = reader.optionalNumber(service, 'startupTimeout', `${at}.startupTimeout`);
  const log = reader.optionalBoolean(service, 'log', `${at}.log`) ?? true;

  return {
    name,
    command: reader.string(service, 'command', `${at}.command`),
    args: reader.optionalStringArray(service, 'args', `${at}.args`),
    env: reader.optionalStringMap(service, 'env', `${at}.env`),
    ports: reader.optionalStringArray(service, 'ports', `${at}.ports`),
    workingDir: cwd === undefined ? rootDir : path.resolve(rootDir, cwd),
    restartPolicy: readRestartPolicy(reader, service, `${at}.restartPolicy`),
    startupTimeoutMs: startupTimeout === undefined ? undefined : secondsToMs(startupTimeout),
    maxRestarts: reader.optionalNumber(service, 'maxRestarts', `${at}.maxRestarts`),
    logFile: log ? path.join(logDir, `${name}.log`) : undefined,
    healthCheck: service.healthCheck === undefined ? undefined : readHealthCheck(reader, service.healthCheck, `${at}.healthCheck`),
  };
}

function readHealthCheck(reader: FieldReader, node: unknown, at: string): Partial<HealthCheck> {
  const check = reader.object(node, at);
  const interval = reader.optionalNumber(check, 'interval', `${at}.interval`);
  const timeout = reader.optionalNumber(check, 'timeout', `${at}.timeout`);

  return {
    url: reader.optionalString(check, 'url', `${at}.url`),
    command: reader.optionalString(check, 'command', `${at}.command`),
    intervalMs: interval === undefined ? undefined : secondsToMs(interval),
    timeoutMs: timeout === undefined ? undefined : secondsToMs(timeout),
    retries: reader.optionalNumber(check, 'retries', `${at}.retries`),
  };
}

function readRestartPolicy(reader: FieldReader, service: JsonObject, at: string): RestartPolicy | undefined {
  const value = reader.optionalString(service, 'restartPolicy', at);
  if (value === undefined) {
    return undefined;
  }
  const policy = RESTART_POLICIES.find(candidate => candidate === value);
  if (!policy) {
    throw new ManifestError(reader.manifestPath, `${at} must be one of ${RESTART_POLICIES.join(', ')}, got '${value}'`);
  }
  return policy;
}

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

class FieldReader {
  constructor(readonly manifestPath: string) {}

  object(value: unknown, at: string): JsonObject {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw this.fail(at, 'an object');
    }
    return Object.fromEntries(Object.entries(value));
  }

  string(node: JsonObject, key: string, at: string): string {
    const value = node[key];
    if (typeof value !== 'string') {
      throw this.fail(at, 'a string');
    }
    return value;
  }

  optionalString(node: JsonObject, key: string, at: string): string | undefined {
    return node[key] === undefined ? undefined : this.string(node, key, at);
  }

  optionalNumber(node: JsonObject, key: string, at: string): number | undefined {
    const value = node[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw this.fail(at, 'a number');
    }
    return value;
  }

  optionalBoolean(node: JsonObject, key: string, at: string): boolean | undefined {
    const value = node[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw this.fail(at, 'a boolean');
    }
    return value;
  }

  optionalStringArray(node: JsonObject, key: string, at: string): string[] | undefined {
    const value = node[key];
    if (value === undefined) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      throw this.fail(at, 'an array of strings');
    }
    return value.map((item, index) => {
      if (typeof item !== 'string') {
        throw this.fail(`${at}[${index}]`, 'a string');
      }
      return item;
    });
  }

  optionalStringMap(node: JsonObject, key: string, at: string): Record<string, string> | undefined {
    if (node[key] === undefined) {
      return undefined;
    }
    const entries = Object.entries(this.object(node[key], at)).map(([name, value]): [string, string] => {
      if (typeof value === 'string') {
        return [name, value];
      }
      if (typeof value === 'number' || typeof value === 'boolean') {
        return [name, String(value)];
      }
      throw this.fail(`${at}.${name}`, 'a string');
    });
    return Object.fromEntries(entries);
  }

  private fail(at: string, expected: string): ManifestError {
    return new ManifestError(this.manifestPath, `${at} must be ${expected}`);
  }
}
