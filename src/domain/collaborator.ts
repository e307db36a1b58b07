/**
 * Collaborator contract.
 *
 * The subsystem under test is reached only through this interface: it
 * hands out exclusive resource handles, accepts asynchronous commands and
 * reports state changes through a registered event sink.
 */

/** What to acquire: a resource kind and the instance within it. */
export interface ResourceSpec {
  kind: string;
  id: string;
  options?: Record<string, unknown>;
}

/** Exclusive access to one collaborator resource. */
export interface ResourceHandle {
  /** Unique per acquisition. */
  readonly id: string;
  readonly resourceId: string;
  readonly kind: string;
}

/** A fire-and-forget command; completion is observed through events. */
export interface CommandSpec {
  name: string;
  args?: Record<string, unknown>;
}

/** Callback the collaborator invokes whenever relevant state changes. */
export type EventSink = (subject: string, kind: string, value: unknown) => void;

export interface Collaborator {
  /** Resolve null when no resource matches the spec. */
  acquireResource(spec: ResourceSpec): Promise<ResourceHandle | null>;
  releaseResource(handle: ResourceHandle): Promise<void>;
  /** Reject when the command is refused; acceptance says nothing about completion. */
  issueCommand(handle: ResourceHandle, command: CommandSpec): Promise<void>;
  /** Register a sink; returns the function that unregisters it. */
  onEvent(sink: EventSink): () => void;
}
