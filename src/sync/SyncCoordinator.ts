import { EventEmitter } from 'events';
import { Logger } from 'homebridge';
import { DEFAULT_MAX_CONCURRENT_FETCHES, DEFAULT_POLL_INTERVAL_SECONDS, UNAVAILABLE_AFTER_AUTH_FAILURES } from '../api/constants';
import { ApiError, AuthError, FetchError, describeError } from '../api/errors';
import { DeviceApi, toApiError } from '../api/RevealApi';
import { Device, DeviceState, MediaReference, MISSING_STATUS, Session } from '../api/types';
import { MediaFetch } from '../media/MediaCache';
import { Settled, mapSettledWithLimit } from './concurrency';

export type CyclePhase = 'idle' | 'acquiringSession' | 'fetchingCatalog' | 'fetchingDeviceStates' | 'publishing';

export interface SessionProvider {
  ensureValid(session?: Session): Promise<Session>;
  forceRenew(session: Session): Promise<Session>;
}

export interface MediaStore {
  getOrRefresh(deviceId: string, candidate: MediaReference): Promise<MediaFetch>;
  peek(deviceId: string): Buffer | undefined;
}

export interface SnapshotEntry {
  readonly device: Device;
  readonly state?: DeviceState;
  /** Reference of the bytes actually held in the media store. */
  readonly media?: MediaReference;
  /** False when this cycle's fetch failed and `state` is carried over from an earlier cycle. */
  readonly fresh: boolean;
  readonly error?: ApiError;
  readonly mediaError?: FetchError;
  readonly lastSuccessAt?: number;
}

export interface Snapshot {
  readonly cycle: number;
  readonly publishedAt: number;
  readonly entries: ReadonlyMap<string, SnapshotEntry>;
}

export type CycleOutcome =
  | { status: 'published'; snapshot: Snapshot }
  | { status: 'failed'; error: AuthError | ApiError }
  | { status: 'cancelled' };

export interface SyncCoordinatorOptions {
  pollIntervalMs?: number;
  maxConcurrentFetches?: number;
  now?: () => number;
}

interface DeviceFetch {
  state: DeviceState;
  media?: MediaReference;
  mediaError?: FetchError;
}

const EMPTY_SNAPSHOT: Snapshot = Object.freeze({ cycle: 0, publishedAt: 0, entries: new Map<string, SnapshotEntry>() });

class CycleCancelled extends Error {}

/**
 * Drives poll cycles: session, catalog, per-device state, publish.
 *
 * Events:
 * - `snapshot` (snapshot) after every published cycle
 * - `cycleFailed` (error, cycle) when session or catalog acquisition fails
 * - `deviceError` (deviceId, error) for each absorbed per-device failure
 * - `mediaError` (deviceId, error) for each absorbed photo download failure
 * - `availability` (available) when sustained authentication failure starts or ends
 * - `phase` (phase)
 */
export class SyncCoordinator extends EventEmitter {
  private readonly pollIntervalMs: number;
  private readonly maxConcurrentFetches: number;
  private readonly now: () => number;

  private session?: Session;
  private snapshot: Snapshot = EMPTY_SNAPSHOT;
  private phase: CyclePhase = 'idle';
  private inFlight?: Promise<CycleOutcome>;
  private timer?: NodeJS.Timeout;
  private cycleCount = 0;
  private stopping = false;
  private authFailures = 0;
  private available = true;

  constructor(
    private readonly sessions: SessionProvider,
    private readonly api: DeviceApi,
    private readonly media: MediaStore,
    private readonly log: Logger,
    options: SyncCoordinatorOptions = {},
  ) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_SECONDS * 1000;
    this.maxConcurrentFetches = Math.max(1, options.maxConcurrentFetches ?? DEFAULT_MAX_CONCURRENT_FETCHES);
    this.now = options.now ?? Date.now;
  }

  public getSnapshot(): Snapshot {
    return this.snapshot;
  }

  public getPhase(): CyclePhase {
    return this.phase;
  }

  public isRunning(): boolean {
    return this.inFlight !== undefined;
  }

  public isAvailable(): boolean {
    return this.available;
  }

  public getImage(deviceId: string): Buffer | undefined {
    return this.media.peek(deviceId);
  }

  /**
   * Runs a cycle now and then every poll interval.
   */
  public start(): void {
    if (this.timer) {
      return;
    }
    this.stopping = false;
    this.log.info(`Polling every ${Math.round(this.pollIntervalMs / 1000)} seconds.`);
    this.timer = setInterval(() => this.onTimer(), this.pollIntervalMs);
    void this.refreshNow();
  }

  /**
   * Stops the timer and waits for an in-flight cycle to reach a phase boundary.
   */
  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.stopping = true;
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Out-of-band cycle. Coalesces with a cycle that is already running.
   */
  public refreshNow(): Promise<CycleOutcome> {
    if (this.inFlight) {
      this.log.debug('Refresh requested while a cycle is running; joining it.');
      return this.inFlight;
    }
    const cycle = this.runCycle().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private onTimer(): void {
    if (this.inFlight) {
      this.log.debug('Previous cycle still running; skipping this tick.');
      return;
    }
    void this.refreshNow();
  }

  private setPhase(phase: CyclePhase): void {
    if (phase !== 'idle' && this.stopping) {
      throw new CycleCancelled();
    }
    this.phase = phase;
    this.notify('phase', phase);
  }

  private async runCycle(): Promise<CycleOutcome> {
    const cycle = ++this.cycleCount;
    this.log.debug(`Cycle ${cycle} started.`);
    try {
      this.setPhase('acquiringSession');
      let session: Session;
      try {
        session = await this.sessions.ensureValid(this.session);
      } catch (error) {
        this.session = undefined;
        return this.fail(cycle, error);
      }
      this.session = session;
      this.markAuthenticated();

      this.setPhase('fetchingCatalog');
      let catalog: Device[];
      try {
        ({ session, catalog } = await this.fetchCatalog(session));
      } catch (error) {
        return this.fail(cycle, error);
      }

      this.setPhase('fetchingDeviceStates');
      const devices = new Map<string, Device>();
      for (const device of catalog) {
        devices.set(device.device_id, device);
      }
      const ids = [...devices.keys()];
      const fetchSession = session;
      const results = await mapSettledWithLimit(ids, this.maxConcurrentFetches, (id) => this.fetchDevice(fetchSession, id));

      this.setPhase('publishing');
      const snapshot = this.publish(cycle, devices, ids, results);
      return { status: 'published', snapshot };
    } catch (error) {
      if (error instanceof CycleCancelled) {
        this.log.info(`Cycle ${cycle} cancelled.`);
        return { status: 'cancelled' };
      }
      return this.fail(cycle, error);
    } finally {
      this.phase = 'idle';
      this.notify('phase', 'idle');
    }
  }

  /**
   * One forced renewal per cycle on Unauthorized, then a single retry.
   */
  private async fetchCatalog(session: Session): Promise<{ session: Session; catalog: Device[] }> {
    try {
      return { session, catalog: await this.api.listDevices(session) };
    } catch (error) {
      if (!(error instanceof ApiError) || error.kind !== 'Unauthorized') {
        throw error;
      }
      this.log.info('Camera list request was unauthorized; renewing session and retrying.');
    }

    let renewed: Session;
    try {
      renewed = await this.sessions.forceRenew(session);
    } catch (error) {
      this.session = undefined;
      throw error;
    }
    this.session = renewed;
    return { session: renewed, catalog: await this.api.listDevices(renewed) };
  }

  private async fetchDevice(session: Session, deviceId: string): Promise<DeviceFetch> {
    const { state, media } = await this.api.fetchState(session, deviceId);
    if (!media) {
      return { state };
    }

    const previous = this.snapshot.entries.get(deviceId)?.media;
    // An unchanged URL keeps the time it was first issued.
    const reference = previous && previous.remote_url === media.remote_url ? previous : media;
    let fetched: MediaFetch;
    try {
      fetched = await this.media.getOrRefresh(deviceId, reference);
    } catch (error) {
      const mediaError = error instanceof FetchError
        ? error
        : new FetchError('NetworkError', describeError(error), undefined, error);
      return { state, mediaError: this.reportMediaError(deviceId, mediaError) };
    }
    if (fetched.error) {
      return { state, media: fetched.reference, mediaError: this.reportMediaError(deviceId, fetched.error) };
    }
    return { state, media: fetched.reference };
  }

  private reportMediaError(deviceId: string, error: FetchError): FetchError {
    this.log.warn(`Camera ${deviceId}: photo download failed: ${error.message}`);
    this.notify('mediaError', deviceId, error);
    return error;
  }

  /**
   * Emits to listeners. A throwing listener is logged and does not affect the cycle.
   */
  private notify(event: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.log.error(`'${event}' listener failed: ${describeError(error)}`);
    }
  }

  private publish(
    cycle: number,
    devices: Map<string, Device>,
    ids: string[],
    results: Settled<DeviceFetch>[],
  ): Snapshot {
    const now = this.now();
    const previous = this.snapshot.entries;
    const entries = new Map<string, SnapshotEntry>();

    ids.forEach((id, index) => {
      const device = devices.get(id);
      const result = results[index];
      if (!device || !result) {
        return;
      }
      const prior = previous.get(id);

      if (result.ok) {
        entries.set(id, {
          device,
          state: result.value.state,
          media: result.value.media,
          fresh: true,
          mediaError: result.value.mediaError,
          lastSuccessAt: now,
        });
        return;
      }

      const error = toApiError(result.error, `Camera ${id}`);
      this.log.warn(`Camera ${id}: ${describeError(error)}; keeping last known state.`);
      this.notify('deviceError', id, error);
      entries.set(id, {
        device: error.kind === 'NotFound' ? { ...device, status: MISSING_STATUS } : device,
        state: prior?.state,
        media: prior?.media,
        fresh: false,
        error,
        lastSuccessAt: prior?.lastSuccessAt,
      });
    });

    for (const [id, prior] of previous) {
      if (!entries.has(id)) {
        this.log.info(`Camera ${prior.device.display_name} is no longer listed; marking as missing.`);
        entries.set(id, { ...prior, device: { ...prior.device, status: MISSING_STATUS }, fresh: false, error: undefined });
      }
    }

    const snapshot: Snapshot = Object.freeze({ cycle, publishedAt: now, entries });
    this.snapshot = snapshot;
    const failed = [...entries.values()].filter((e) => e.error).length;
    this.log.info(`Cycle ${cycle} published ${entries.size} cameras (${failed} stale).`);
    this.notify('snapshot', snapshot);
    return snapshot;
  }

  private markAuthenticated(): void {
    this.authFailures = 0;
    if (!this.available) {
      this.available = true;
      this.log.info('Authentication restored.');
      this.notify('availability', true);
    }
  }

  private fail(cycle: number, cause: unknown): CycleOutcome {
    const error = cause instanceof AuthError ? cause : toApiError(cause, 'Camera list');
    if (error instanceof AuthError) {
      this.authFailures++;
      if (this.available && this.authFailures >= UNAVAILABLE_AFTER_AUTH_FAILURES) {
        this.available = false;
        this.log.error(`Authentication failed ${this.authFailures} cycles in a row; cameras marked unavailable.`);
        this.notify('availability', false);
      }
    }
    this.log.error(`Cycle ${cycle} failed: ${describeError(error)}`);
    this.notify('cycleFailed', error, cycle);
    return { status: 'failed', error };
  }
}
