import { createSilentLogger, type Logger } from "@evcs/observability";

import type { ChargingApi, ChargingState } from "../api/client";
import type { ApiError } from "../api/errors";
import type { SessionStore } from "../stores/sessionStore";
import {
  applyObservation,
  CHARGING_FINISHED_MESSAGE,
  INITIAL_OBSERVATION,
  type StatusView
} from "./statusTransition";

export type TickOutcome = "skipped" | "busy" | "failed" | "discarded" | "updated";

export type StatusPollerListener = {
  onView?: (view: StatusView) => void;
  onCompleted?: (message: string, view: StatusView) => void;
  onError?: (error: ApiError) => void;
  /** The session changed; anything rendered from the previous one is stale. */
  onReset?: () => void;
};

export type StatusPollerOptions = {
  api: Pick<ChargingApi, "previewQueue" | "serverTime">;
  session: SessionStore;
  intervalMs?: number;
  logger?: Logger;
};

/**
 * Polls queue status while a user is signed in and reports the
 * CHARGING -> NOTCHARGING edge exactly once per occurrence.
 *
 * Ticks never overlap: a tick requested while another is in flight returns "busy",
 * and the timer loop only schedules the next tick after the current one settles.
 */
export class StatusPoller {
  private readonly api: StatusPollerOptions["api"];
  private readonly session: SessionStore;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly listeners = new Set<StatusPollerListener>();
  private readonly unsubscribeSession: () => void;

  private observation: ChargingState = INITIAL_OBSERVATION;
  private view: StatusView | null = null;
  private inFlight = false;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: StatusPollerOptions) {
    this.api = options.api;
    this.session = options.session;
    this.intervalMs = options.intervalMs ?? 1000;
    this.logger = options.logger ?? createSilentLogger();

    this.unsubscribeSession = this.session.subscribe((state, prev) => {
      if (state.token === prev.token) return;
      this.observation = INITIAL_OBSERVATION;
      this.view = null;
      this.emit((l) => l.onReset?.());
    });
  }

  subscribe(listener: StatusPollerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  currentView(): StatusView | null {
    return this.view;
  }

  lastObservation(): ChargingState {
    return this.observation;
  }

  isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<TickOutcome> {
    if (!this.session.isAuthenticated()) return "skipped";
    if (this.inFlight) return "busy";

    this.inFlight = true;
    try {
      return await this.poll(this.session.currentToken());
    } finally {
      this.inFlight = false;
    }
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(this.intervalMs);
    this.logger.info({ intervalMs: this.intervalMs }, "status poller started");
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.logger.info("status poller stopped");
  }

  dispose(): void {
    this.stop();
    this.unsubscribeSession();
    this.listeners.clear();
  }

  private async poll(token: string): Promise<TickOutcome> {
    const status = await this.api.previewQueue();
    if (!status.success) return this.failed(token, status.error);
    // No further calls once the session that started this tick is gone.
    if (this.stale(token)) return "discarded";

    const time = await this.api.serverTime();
    if (!time.success) return this.failed(token, time.error);
    if (this.stale(token)) return "discarded";

    const transition = applyObservation(this.observation, status.data, time.data);
    if (transition.next !== this.observation) {
      this.logger.info({ from: this.observation, to: transition.next }, "charging state changed");
    }
    this.observation = transition.next;
    this.view = transition.view;

    const view = transition.view;
    this.emit((l) => l.onView?.(view));
    if (transition.completed) {
      this.emit((l) => l.onCompleted?.(CHARGING_FINISHED_MESSAGE, view));
    }
    return "updated";
  }

  private stale(token: string): boolean {
    if (this.session.currentToken() === token) return false;
    this.logger.debug("session changed during poll, result discarded");
    return true;
  }

  private failed(token: string, error: ApiError): TickOutcome {
    if (this.session.currentToken() !== token) {
      this.logger.debug({ kind: error.kind }, "session changed during poll, failure discarded");
      return "discarded";
    }
    this.logger.warn({ kind: error.kind, message: error.message }, "poll tick failed");
    this.emit((l) => l.onError?.(error));
    return "failed";
  }

  private emit(fn: (listener: StatusPollerListener) => void): void {
    for (const listener of [...this.listeners]) {
      try {
        fn(listener);
      } catch (err: unknown) {
        this.logger.error({ err }, "status listener threw");
      }
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      void this.loop();
    }, delayMs);
  }

  private async loop(): Promise<void> {
    this.timer = null;
    if (!this.running) return;

    const startedAt = Date.now();
    try {
      await this.tick();
    } catch (err: unknown) {
      this.logger.error({ err }, "poll tick crashed");
    }

    if (!this.running) return;
    this.schedule(Math.max(0, this.intervalMs - (Date.now() - startedAt)));
  }
}
