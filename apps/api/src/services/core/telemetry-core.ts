import { createDataSourceFactory, createRng, wallClockNow } from '@agri-telemetry/adapters';
import {
  CLEAR_EMERGENCY_STOP_COMMAND,
  EMERGENCY_STOP_COMMAND,
  UNKNOWN_TRACTOR,
  err,
  ok,
} from '@agri-telemetry/domain';
import type {
  AlertListener,
  AvailableInterface,
  Command,
  CommandReceipt,
  ConnectionDescriptor,
  ConnectionFailure,
  ConnectionInfo,
  ConnectionState,
  ConnectionType,
  DataListener,
  DataSourceFactory,
  DataSourcePort,
  HistoryEntry,
  LoggerPort,
  ParameterReading,
  RandomSource,
  Result,
  SafetyViolation,
  StatusChange,
  StatusListener,
  Subscription,
  TelemetryAlert,
  TelemetryCorePort,
  TelemetryFrame,
  TelemetryParameter,
  TelemetrySnapshot,
  TractorInfo,
} from '@agri-telemetry/domain';
import { ConnectionStateMachine } from '../connection/connection-state-machine.js';
import { SafetyGate } from '../safety/safety-gate.js';
import { TelemetrySimulator } from '../simulator/telemetry-simulator.js';
import { SubscriberList } from './subscriber-list.js';
import { parseCoreConfig } from './core-config.js';
import type { TelemetryCoreConfig, TelemetryCoreConfigInput } from './core-config.js';
import { NotConnectedError, SimulationFault, UnknownChannelError, describeError } from '../../errors.js';

function copyAlert(alert: TelemetryAlert): TelemetryAlert {
  return { ...alert, timestamp: new Date(alert.timestamp.getTime()) };
}

/** Each subscriber gets its own frame so none can alter what the next one sees. */
function copyFrame(frame: TelemetryFrame): TelemetryFrame {
  const snapshot: Record<string, ParameterReading> = {};
  for (const [name, reading] of Object.entries(frame.snapshot)) {
    snapshot[name] = { ...reading, timestamp: new Date(reading.timestamp.getTime()) };
  }
  return {
    tick: frame.tick,
    timestamp: new Date(frame.timestamp.getTime()),
    snapshot,
    alerts: frame.alerts.map(copyAlert),
  };
}

const SCANNED_TYPES: readonly ConnectionType[] = ['SIMULATION', 'CAN_BUS', 'OBD_II'];
const DEFAULT_HISTORY_COUNT = 100;

export interface TelemetryCoreDeps {
  readonly logger: LoggerPort;
  /** Defaults to the simulation and protocol backends of the adapters package. */
  readonly dataSources?: DataSourceFactory;
  /** Defaults to a generator seeded from `config.seed`. */
  readonly rng?: RandomSource;
  /** Epoch milliseconds. */
  readonly clock?: () => number;
}

/**
 * Composition root of the telemetry core: owns the connection state, the
 * simulator of the current session, the safety gate and the subscriber
 * lists, and runs the periodic tick.
 *
 * Ticks, commands and reads all run to completion on the event loop, so a
 * reader never observes a partially applied tick and the emergency latch
 * cannot change in the middle of a tick.
 */
export class TelemetryCore implements TelemetryCorePort {
  readonly config: TelemetryCoreConfig;

  private readonly logger: LoggerPort;
  private readonly clock: () => number;
  private readonly dataSources: DataSourceFactory;
  private readonly machine: ConnectionStateMachine;
  private readonly gate: SafetyGate;
  private readonly dataListeners: SubscriberList<TelemetryFrame>;
  private readonly statusListeners: SubscriberList<StatusChange>;
  private readonly alertListeners: SubscriberList<TelemetryAlert>;

  private source: DataSourcePort | null = null;
  private simulator: TelemetrySimulator | null = null;
  private tractor: TractorInfo = UNKNOWN_TRACTOR;
  private lastCommunication: Date | undefined;
  private timer: ReturnType<typeof setInterval> | null = null;
  private session = 0;

  constructor(config: TelemetryCoreConfigInput, deps: TelemetryCoreDeps) {
    this.config = parseCoreConfig(config);
    this.logger = deps.logger;
    this.clock = deps.clock ?? wallClockNow;
    this.dataSources = deps.dataSources ?? createDataSourceFactory({
      rng: deps.rng ?? createRng(this.config.seed),
      logger: deps.logger,
    });

    this.dataListeners = new SubscriberList('data', this.logger);
    this.statusListeners = new SubscriberList('status', this.logger);
    this.alertListeners = new SubscriberList('alert', this.logger);

    this.machine = new ConnectionStateMachine((change) => this.onTransition(change), this.clock);
    this.gate = new SafetyGate({
      logger: this.logger.child('safety'),
      maxCommandRate: this.config.maxCommandRate,
      safeMode: this.config.safeMode,
      safetyChecksEnabled: this.config.safetyChecksEnabled,
      safeModeCommands: this.config.safeModeCommands,
      clock: this.clock,
    });
  }

  get state(): ConnectionState {
    return this.machine.state;
  }

  get ticking(): boolean {
    return this.timer !== null;
  }

  scanInterfaces(): AvailableInterface[] {
    const found: AvailableInterface[] = [];
    for (const type of SCANNED_TYPES) {
      const source = this.dataSources({ type });
      if (source) found.push(source.describe());
    }
    this.logger.info(`found ${found.length} available interfaces`);
    return found;
  }

  connect(descriptor: ConnectionDescriptor): Result<TractorInfo, ConnectionFailure> {
    if (this.machine.state === 'ERROR') {
      return err({ reason: 'SESSION_FAULTED', message: 'session faulted; disconnect before reconnecting' });
    }
    if (this.machine.state !== 'DISCONNECTED') {
      return err({ reason: 'ALREADY_CONNECTED', message: 'already connected to a tractor' });
    }

    const source = this.dataSources(descriptor);
    if (!source) {
      return err({ reason: 'UNSUPPORTED_SOURCE', message: `unsupported connection type: ${descriptor.type}` });
    }

    this.logger.info(`connecting to ${descriptor.name ?? source.describe().name}`);
    let tractor: TractorInfo;
    let simulator: TelemetrySimulator;
    try {
      tractor = source.connect(descriptor);
      simulator = new TelemetrySimulator({
        source,
        historyCapacity: this.config.historyCapacity,
        clock: this.clock,
      });
    } catch (cause) {
      const message = `failed to connect: ${describeError(cause)}`;
      this.logger.error(message);
      this.closeSource(source);
      this.machine.apply('fault', message);
      return err({ reason: 'COMMUNICATION_FAILED', message });
    }

    this.source = source;
    this.simulator = simulator;
    this.tractor = tractor;
    this.gate.reset();
    this.lastCommunication = new Date(this.clock());
    this.session += 1;
    // started first so a status listener that disconnects also stops it
    this.startLoop();
    this.machine.apply('connect');
    this.logger.info(`connected to ${tractor.manufacturer} ${tractor.model}`);
    return ok(tractor);
  }

  /** Stops the tick loop before returning; no tick fires afterwards. */
  disconnect(): void {
    this.stopLoop();
    if (this.machine.state === 'DISCONNECTED') return;

    this.logger.info('disconnecting from tractor');
    if (this.source) this.closeSource(this.source);
    this.source = null;
    this.gate.reset();
    this.lastCommunication = undefined;
    this.machine.apply('disconnect');
  }

  sendCommand(command: Command): Result<CommandReceipt, SafetyViolation> {
    if (command.name === CLEAR_EMERGENCY_STOP_COMMAND) {
      if (!this.machine.sessionOpen) {
        return err({ reason: 'NOT_CONNECTED', command: command.name, message: 'not connected to a tractor' });
      }
      this.clearEmergencyStop();
      return ok(this.receipt(command));
    }

    const violation = this.gate.admit(command, {
      state: this.machine.state,
      bounds: (channel) => this.simulator?.definition(channel),
    }, this.clock());
    if (violation) return err(violation);

    if (command.name === EMERGENCY_STOP_COMMAND) {
      this.logger.warn('EMERGENCY STOP ACTIVATED');
      if (this.machine.can('emergency_stop')) this.machine.apply('emergency_stop');
    } else {
      this.logger.info(`sending command: ${command.name} = ${command.value ?? ''}`);
    }

    try {
      this.source?.execute(command);
    } catch (cause) {
      const fault = new SimulationFault(`command ${command.name} failed: ${describeError(cause)}`, cause);
      this.fail(fault);
      throw fault;
    }
    return ok(this.receipt(command));
  }

  /** Explicit operator action; returns whether a latch was cleared. */
  clearEmergencyStop(): boolean {
    const wasActive = this.gate.clearEmergency();
    if (this.machine.state === 'EMERGENCY_STOP') this.machine.apply('clear_emergency_stop');
    if (wasActive) this.logger.info('emergency stop cleared');
    return wasActive;
  }

  setSafeMode(enabled: boolean): void {
    this.gate.setSafeMode(enabled);
    this.logger.info(`safe mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  /**
   * Advances the session by one tick and notifies subscribers. Called by
   * the loop, or directly when `autoTick` is off. A failure moves the core
   * to ERROR, stops the loop and is rethrown as a SimulationFault.
   */
  tick(nowMs: number = this.clock()): TelemetryFrame {
    const simulator = this.liveSimulator();

    let frame: TelemetryFrame;
    try {
      frame = simulator.tick(nowMs);
    } catch (cause) {
      const fault = cause instanceof SimulationFault
        ? cause
        : new SimulationFault(`tick failed: ${describeError(cause)}`, cause);
      this.fail(fault);
      throw fault;
    }

    this.lastCommunication = frame.timestamp;
    const session = this.session;
    const active = () => this.session === session && this.sessionLive();
    this.dataListeners.emit(frame, { active, copy: copyFrame });
    for (const alert of frame.alerts) {
      if (!active()) break;
      this.logger.warn(`TRACTOR ALERT: ${alert.message}`);
      this.alertListeners.emit(alert, { active, copy: copyAlert });
    }
    return frame;
  }

  /** Overrides one channel's sampled value on the next tick. */
  inject(channel: string, value: number): void {
    this.liveSimulator().inject(channel, value);
  }

  snapshot(): TelemetrySnapshot {
    return this.simulator?.snapshot() ?? {};
  }

  parameters(): TelemetryParameter[] {
    return this.simulator?.parameters() ?? [];
  }

  /** Before the first session, channels any backend serves read as empty. */
  history(channel: string, count: number = DEFAULT_HISTORY_COUNT): HistoryEntry[] {
    if (this.simulator) return this.simulator.history(channel, count);
    if (!this.offeredChannels().has(channel)) throw new UnknownChannelError(channel);
    return [];
  }

  connectionInfo(): ConnectionInfo {
    const state = this.machine.state;
    return {
      connectionType: this.source?.type,
      status: state,
      connected: this.sessionLive(),
      lastCommunication: this.lastCommunication ? new Date(this.lastCommunication.getTime()) : undefined,
      emergencyStopActive: this.gate.emergencyActive,
      safeMode: this.gate.safeMode,
      tractorInfo: this.tractor,
    };
  }

  subscribeData(listener: DataListener): Subscription {
    return this.dataListeners.add(listener);
  }

  subscribeStatus(listener: StatusListener): Subscription {
    return this.statusListeners.add(listener);
  }

  subscribeAlert(listener: AlertListener): Subscription {
    return this.alertListeners.add(listener);
  }

  private sessionLive(): boolean {
    const state = this.machine.state;
    return state === 'CONNECTED' || state === 'EMERGENCY_STOP';
  }

  private liveSimulator(): TelemetrySimulator {
    if (!this.simulator || !this.sessionLive()) throw new NotConnectedError();
    return this.simulator;
  }

  private offeredChannels(): Set<string> {
    const names = new Set<string>();
    for (const type of SCANNED_TYPES) {
      for (const definition of this.dataSources({ type })?.channels() ?? []) names.add(definition.name);
    }
    return names;
  }

  private startLoop(): void {
    if (!this.config.autoTick || this.timer) return;
    this.timer = setInterval(() => this.runTick(), this.config.tickIntervalMs);
    this.logger.debug(`tick loop started (${this.config.tickIntervalMs}ms)`);
  }

  private stopLoop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.debug('tick loop stopped');
  }

  private runTick(): void {
    try {
      this.tick();
    } catch (cause) {
      // a SimulationFault was already reported through fail(), which stopped the loop
      if (cause instanceof SimulationFault) return;
      this.stopLoop();
      this.logger.warn(`tick loop halted: ${describeError(cause)}`);
    }
  }

  /** Halts the session; recovery needs disconnect() then connect(). */
  private fail(fault: SimulationFault): void {
    this.stopLoop();
    this.logger.error(`simulation fault: ${fault.message}`);
    this.machine.apply('fault', fault.message);
  }

  private closeSource(source: DataSourcePort): void {
    try {
      source.disconnect();
    } catch (cause) {
      this.logger.warn(`data source did not close cleanly: ${describeError(cause)}`);
    }
  }

  private onTransition(change: StatusChange): void {
    this.logger.info(`status ${change.previous} -> ${change.current}`);
    this.statusListeners.emit(change);
  }

  private receipt(command: Command): CommandReceipt {
    return { command: { ...command }, acceptedAt: new Date(this.clock()) };
  }
}
