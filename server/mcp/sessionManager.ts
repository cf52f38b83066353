/**
 * Session Manager
 *
 * Purpose:
 * Owns the one live connection to the capability provider process:
 * spawn + handshake on connect, reuse for the same target, teardown on
 * disconnect, target change, or transport loss.
 *
 * Every provider request runs through a single queue, so at most one is in
 * flight at a time even when several HTTP queries share the session.
 *
 * Layer: MCP (connection lifecycle)
 */

import { ResourceStack } from "./resourceStack";
import type { CapabilityDescriptor, ProviderConnection, ProviderConnector, ToolCallPayload } from "./types";
import type { JsonObject } from "../utils/guards";
import { CapabilityExecutionError, ConnectionError, NotConnectedError } from "../utils/errorHandler";
import { logDebug, logInfo, logWarn } from "../utils/logger";

type Session = {
  target: string;
  connection: ProviderConnection;
  resources: ResourceStack;
};

export class SessionManager {
  private session: Session | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly connector: ProviderConnector;

  constructor(connector: ProviderConnector) {
    this.connector = connector;
  }

  get isConnected(): boolean {
    return this.session !== null;
  }

  get currentTarget(): string | null {
    return this.session?.target ?? null;
  }

  connect(target: string): Promise<void> {
    return this.exclusive(async () => {
      if (this.session?.target === target) {
        logDebug(`[Session] Reusing connection to ${target}`);
        return;
      }

      if (this.session) {
        logInfo(`[Session] Switching provider from ${this.session.target} to ${target}`);
        await this.teardown();
      }

      const resources = new ResourceStack();
      let connection: ProviderConnection;
      try {
        connection = await this.connector(target, resources);
      } catch (error) {
        await resources.close();
        throw new ConnectionError(target, error);
      }

      const session: Session = { target, connection, resources };
      connection.onClosed(() => this.handleTransportClosed(session));
      this.session = session;
      logInfo(`[Session] Connected to provider ${target}`, { target });
    });
  }

  listCapabilities(): Promise<CapabilityDescriptor[]> {
    return this.exclusive(async () => {
      const session = this.requireSession();
      return session.connection.listTools();
    });
  }

  invoke(name: string, args: JsonObject): Promise<ToolCallPayload> {
    return this.exclusive(async () => {
      const session = this.requireSession();

      let payload: ToolCallPayload;
      try {
        payload = await session.connection.callTool(name, args);
      } catch (error) {
        throw new CapabilityExecutionError(name, error);
      }

      if (payload.isError) {
        throw new CapabilityExecutionError(name, payload.content);
      }
      return payload;
    });
  }

  /**
   * Always resolves; release errors are logged by the resource stack.
   */
  disconnect(): Promise<void> {
    return this.exclusive(() => this.teardown());
  }

  private async teardown(): Promise<void> {
    const session = this.session;
    if (!session) return;

    this.session = null;
    const failures = await session.resources.close();
    logInfo(`[Session] Disconnected from provider ${session.target}`, {
      target: session.target,
      ...(failures.length > 0 && { releaseFailures: failures.length }),
    });
  }

  private handleTransportClosed(session: Session): void {
    // Closed by our own teardown, or belongs to an older session
    if (this.session !== session) return;

    logWarn(`[Session] Provider transport closed unexpectedly`, { target: session.target });
    this.session = null;
    session.resources.close().catch((error: unknown) => {
      logWarn(`[Session] Cleanup after transport loss failed: ${String(error)}`);
    });
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new NotConnectedError();
    }
    return this.session;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
