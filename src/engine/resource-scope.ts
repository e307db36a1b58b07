/**
 * ResourceScope: one acquisition, exactly one release.
 *
 * A scope holds at most one handle for its lifetime. release() may be
 * called any number of times from any cleanup path; only the first call
 * reaches the collaborator and later calls share its outcome. A failed
 * release is logged and reported, never thrown.
 */

import { Collaborator, ResourceHandle, ResourceSpec } from '../domain/collaborator';
import {
  AcquireError,
  ReleaseError,
  acquireFailedError,
  alreadyHeldError,
  describeThrown,
  releaseFailedError,
  resourceUnavailableError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

export type ScopeState = 'idle' | 'acquiring' | 'held' | 'released';

export type ReleaseOutcome =
  | { released: true }
  /** Nothing was held: acquisition never happened or failed. */
  | { released: false; skipped: true }
  | { released: false; skipped: false; error: ReleaseError };

export interface ResourceScopeOptions {
  logger?: Logger;
  /** Stamped on errors raised by this scope. */
  scenarioId?: string;
}

export class ResourceScope {
  private state: ScopeState = 'idle';
  private current?: ResourceHandle;
  private acquisition?: Promise<ResourceHandle>;
  private releasing?: Promise<ReleaseOutcome>;
  private readonly logger: Logger;
  private readonly scenarioId?: string;

  constructor(
    private readonly collaborator: Collaborator,
    options: ResourceScopeOptions = {},
  ) {
    this.logger = options.logger ?? rootLogger.child({ module: 'resource-scope' });
    this.scenarioId = options.scenarioId;
  }

  get status(): ScopeState {
    return this.state;
  }

  get handle(): ResourceHandle | undefined {
    return this.current;
  }

  /** Acquire the resource; rejects with AcquireError on any failure. */
  acquire(spec: ResourceSpec): Promise<ResourceHandle> {
    if (this.state !== 'idle') {
      return Promise.reject(new AcquireError(alreadyHeldError(this.current?.resourceId ?? spec.id, this.scenarioId)));
    }
    this.state = 'acquiring';
    this.acquisition = this.acquireOnce(spec);
    return this.acquisition;
  }

  /** Release the held resource. Idempotent. */
  release(): Promise<ReleaseOutcome> {
    if (!this.releasing) {
      this.releasing = this.releaseOnce();
    }
    return this.releasing;
  }

  private async acquireOnce(spec: ResourceSpec): Promise<ResourceHandle> {
    let handle: ResourceHandle | null;
    try {
      handle = await this.collaborator.acquireResource(spec);
    } catch (err) {
      this.state = 'released';
      throw new AcquireError(acquireFailedError(spec.kind, spec.id, describeThrown(err), this.scenarioId));
    }

    if (!handle) {
      this.state = 'released';
      throw new AcquireError(resourceUnavailableError(spec.kind, spec.id, this.scenarioId));
    }

    this.current = handle;
    if (!this.releasing) this.state = 'held';
    this.logger.debug('Resource acquired', { kind: handle.kind, resourceId: handle.resourceId, handleId: handle.id });
    return handle;
  }

  private async releaseOnce(): Promise<ReleaseOutcome> {
    // A release requested mid-acquisition waits for the handle it must free.
    if (this.acquisition) {
      await this.acquisition.catch(() => undefined);
    }
    const handle = this.current;
    this.state = 'released';
    if (!handle) return { released: false, skipped: true };

    try {
      await this.collaborator.releaseResource(handle);
      this.logger.debug('Resource released', { resourceId: handle.resourceId, handleId: handle.id });
      return { released: true };
    } catch (err) {
      const error = new ReleaseError(releaseFailedError(handle.resourceId, describeThrown(err), this.scenarioId));
      this.logger.warn('Resource release failed', {
        resourceId: handle.resourceId,
        handleId: handle.id,
        code: error.typedError.code,
        error: error.message,
      });
      return { released: false, skipped: false, error };
    }
  }
}

/**
 * Run `fn` with an acquired resource, releasing it however `fn` ends.
 * The release outcome never replaces `fn`'s result or error.
 */
export async function withResource<T>(
  collaborator: Collaborator,
  spec: ResourceSpec,
  fn: (handle: ResourceHandle) => Promise<T>,
  options: ResourceScopeOptions = {},
): Promise<T> {
  const scope = new ResourceScope(collaborator, options);
  try {
    const handle = await scope.acquire(spec);
    return await fn(handle);
  } finally {
    await scope.release();
  }
}
