/**
 * Service Registry
 * Versioned store of published services keyed by (name, version)
 */

import _ from 'lodash';
import { ServiceDescriptor, ServiceError, ServiceErrorCode } from '@creditops/types';
import { ServiceBinding, ServiceChange, ServiceEntry, ServiceKey } from '../models/types';

const SERVICE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;
const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?$/;

/**
 * Fields a caller supplies when creating a service; the registry owns
 * revision, model id and timestamps.
 */
export interface ServiceDraft {
  name: string;
  version: string;
  adapter: string;
  description?: string;
  inputs: ServiceDescriptor['inputs'];
  outputs: ServiceDescriptor['outputs'];
  binding: ServiceBinding;
}

export interface ServiceRegistry {
  create(draft: ServiceDraft): Promise<ServiceEntry>;
  get(name: string, version: string): Promise<ServiceEntry>;
  list(name?: string): Promise<ServiceDescriptor[]>;
  /**
   * Swap the bound model in place. With expectedRevision set, the swap only
   * happens when it equals the stored revision.
   */
  replace(name: string, version: string, change: ServiceChange, expectedRevision?: number): Promise<ServiceEntry>;
  delete(name: string, version: string): Promise<void>;
}

/**
 * Accepts `1.0`, `1.0.2` and `v1.0`; returns the form without the prefix
 */
export function normalizeVersion(version: string): string {
  const trimmed = version.trim().replace(/^[vV]/, '');
  if (!VERSION_PATTERN.test(trimmed)) {
    throw new ServiceError(
      ServiceErrorCode.INVALID_REQUEST,
      `Invalid version "${version}": expected major.minor[.patch]`
    );
  }
  return trimmed;
}

export function validateServiceName(name: string): string {
  if (!SERVICE_NAME_PATTERN.test(name)) {
    throw new ServiceError(
      ServiceErrorCode.INVALID_REQUEST,
      `Invalid service name "${name}": must start with a letter and contain only letters, digits, "_" or "-"`
    );
  }
  return name;
}

export function parseServiceKey(name: string, version: string): ServiceKey {
  return { name: validateServiceName(name), version: normalizeVersion(version) };
}

export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}

function keyOf(name: string, version: string): string {
  return `${name}@${version}`;
}

function snapshot(entry: ServiceEntry): ServiceEntry {
  return { descriptor: _.cloneDeep(entry.descriptor), binding: entry.binding };
}

export class InMemoryServiceRegistry implements ServiceRegistry {
  private entries = new Map<string, ServiceEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(draft: ServiceDraft): Promise<ServiceEntry> {
    const key = keyOf(draft.name, draft.version);
    if (this.entries.has(key)) {
      throw new ServiceError(
        ServiceErrorCode.CONFLICT,
        `Service ${draft.name} version ${draft.version} already exists`
      );
    }

    const timestamp = this.now().toISOString();
    const descriptor: ServiceDescriptor = {
      name: draft.name,
      version: draft.version,
      revision: 1,
      adapter: draft.adapter,
      inputs: { ...draft.inputs },
      outputs: { ...draft.outputs },
      modelId: draft.binding.modelId,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    if (draft.description !== undefined) {
      descriptor.description = draft.description;
    }

    const entry: ServiceEntry = { descriptor, binding: draft.binding };
    this.entries.set(key, entry);
    return snapshot(entry);
  }

  async get(name: string, version: string): Promise<ServiceEntry> {
    return snapshot(this.require(name, version));
  }

  async list(name?: string): Promise<ServiceDescriptor[]> {
    return Array.from(this.entries.values())
      .map((entry) => entry.descriptor)
      .filter((descriptor) => name === undefined || descriptor.name === name)
      .sort((a, b) => a.name.localeCompare(b.name) || compareVersions(a.version, b.version))
      .map((descriptor) => _.cloneDeep(descriptor));
  }

  async replace(
    name: string,
    version: string,
    change: ServiceChange,
    expectedRevision?: number
  ): Promise<ServiceEntry> {
    const current = this.require(name, version);
    if (expectedRevision !== undefined && expectedRevision !== current.descriptor.revision) {
      throw new ServiceError(
        ServiceErrorCode.REVISION_MISMATCH,
        `Service ${name} version ${version} is at revision ${current.descriptor.revision}, expected ${expectedRevision}`
      );
    }

    const descriptor: ServiceDescriptor = {
      ...current.descriptor,
      revision: current.descriptor.revision + 1,
      modelId: change.binding.modelId,
      updatedAt: this.now().toISOString(),
    };
    if (change.description !== undefined) {
      descriptor.description = change.description;
    }

    const entry: ServiceEntry = { descriptor, binding: change.binding };
    this.entries.set(keyOf(name, version), entry);
    return snapshot(entry);
  }

  async delete(name: string, version: string): Promise<void> {
    this.require(name, version);
    this.entries.delete(keyOf(name, version));
  }

  get size(): number {
    return this.entries.size;
  }

  private require(name: string, version: string): ServiceEntry {
    const entry = this.entries.get(keyOf(name, version));
    if (!entry) {
      throw new ServiceError(ServiceErrorCode.NOT_FOUND, `Service ${name} version ${version} not found`);
    }
    return entry;
  }
}
