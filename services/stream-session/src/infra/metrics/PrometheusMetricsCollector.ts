import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { DropReason, ErrorType, FrameKind, MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { SESSION_STATES, type SessionState } from '@/domain/models/SessionState';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 *
 * 責務: prom-client を使用してセッションのメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter;
  private readonly droppedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly stateGauge: Gauge;
  private readonly subscriptionsGauge: Gauge;
  private readonly heartbeatRtt: Histogram;

  constructor() {
    this.register = new Registry();

    this.receivedCounter = new Counter({
      name: 'session_frames_received_total',
      help: 'Total number of frames received from the venue',
      labelNames: ['session', 'kind'],
      registers: [this.register],
    });

    this.droppedCounter = new Counter({
      name: 'session_frames_dropped_total',
      help: 'Data frames not dispatched to any handler',
      labelNames: ['session', 'reason'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'session_errors_total',
      help: 'Total number of contained or fatal errors',
      labelNames: ['session', 'error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'session_reconnects_total',
      help: 'Total number of reconnect cycles started',
      labelNames: ['session'],
      registers: [this.register],
    });

    // 現在の状態だけ 1、他は 0
    this.stateGauge = new Gauge({
      name: 'session_state',
      help: 'Current session state (1 for the active state)',
      labelNames: ['session', 'state'],
      registers: [this.register],
    });

    this.subscriptionsGauge = new Gauge({
      name: 'session_active_subscriptions',
      help: 'Number of desired-active subscriptions',
      labelNames: ['session'],
      registers: [this.register],
    });

    this.heartbeatRtt = new Histogram({
      name: 'session_heartbeat_rtt_ms',
      help: 'Round trip time between ping and pong in milliseconds',
      labelNames: ['session'],
      buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
      registers: [this.register],
    });
  }

  incrementReceived(session: string, kind: FrameKind): void {
    this.receivedCounter.inc({ session, kind });
  }

  incrementDropped(session: string, reason: DropReason): void {
    this.droppedCounter.inc({ session, reason });
  }

  incrementError(session: string, errorType: ErrorType): void {
    this.errorCounter.inc({ session, error_type: errorType });
  }

  incrementReconnect(session: string): void {
    this.reconnectCounter.inc({ session });
  }

  setSessionState(session: string, state: SessionState): void {
    for (const candidate of SESSION_STATES) {
      this.stateGauge.set({ session, state: candidate }, candidate === state ? 1 : 0);
    }
  }

  setActiveSubscriptions(session: string, count: number): void {
    this.subscriptionsGauge.set({ session }, count);
  }

  observeHeartbeatRtt(session: string, rttMs: number): void {
    this.heartbeatRtt.observe({ session }, rttMs);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    return this.register;
  }
}
