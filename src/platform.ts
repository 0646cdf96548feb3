import { API, DynamicPlatformPlugin, Logger, PlatformAccessory, PlatformConfig, Service, Characteristic } from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings';
import { parseConfig } from './config';
import { SESSION_MIN_MARGIN_MS } from './api/constants';
import { CredentialStore } from './api/CredentialStore';
import { SessionManager } from './api/SessionManager';
import { RevealApi } from './api/RevealApi';
import { MediaCache } from './media/MediaCache';
import { Snapshot, SyncCoordinator } from './sync/SyncCoordinator';
import { TrailCameraAccessory, TrailCameraContext } from './accessories/TrailCameraAccessory';

export class CellCamPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;
  public readonly accessories: PlatformAccessory<TrailCameraContext>[] = [];
  private readonly accessoryHandlers = new Map<string, TrailCameraAccessory>();
  private coordinator?: SyncCoordinator;
  private pruned = false;

  constructor(
    public readonly log: Logger,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = this.api.hap.Service;
    this.Characteristic = this.api.hap.Characteristic;
    this.log.debug('Finished initializing platform:', this.config.name);

    this.api.on('didFinishLaunching', () => {
      log.debug('Executed didFinishLaunching callback');
      this.startSync();
    });

    this.api.on('shutdown', () => {
      this.log.info('Homebridge is shutting down, stopping camera polling.');
      for (const handler of this.accessoryHandlers.values()) {
        handler.dispose();
      }
      void this.coordinator?.stop();
    });
  }

  configureAccessory(accessory: PlatformAccessory<TrailCameraContext>) {
    this.log.info('Loading accessory from cache:', accessory.displayName);
    this.accessories.push(accessory);
  }

  private startSync() {
    const parsed = parseConfig(this.config);
    if (!parsed.ok) {
      for (const message of parsed.errors) {
        this.log.error(`Invalid configuration: ${message}`);
      }
      return;
    }
    const { config } = parsed;
    const pollIntervalMs = config.pollInterval * 1000;

    const sessions = new SessionManager(new CredentialStore(config.username, config.password), this.log, {
      marginMs: Math.max(SESSION_MIN_MARGIN_MS, pollIntervalMs),
      userPoolId: config.userPoolId,
    });
    const api = new RevealApi(this.log, { photoSampleSize: config.photoSampleSize });
    const media = new MediaCache(this.log);

    this.coordinator = new SyncCoordinator(sessions, api, media, this.log, {
      pollIntervalMs,
      maxConcurrentFetches: config.maxConcurrentFetches,
    });
    this.coordinator.on('snapshot', (snapshot: Snapshot) => this.applySnapshot(snapshot));
    this.coordinator.on('availability', (available: boolean) => {
      for (const handler of this.accessoryHandlers.values()) {
        handler.setAvailable(available);
      }
    });
    this.coordinator.start();
  }

  public requestRefresh(): void {
    if (!this.coordinator) {
      this.log.warn('Camera polling is not running, ignoring refresh request.');
      return;
    }
    void this.coordinator.refreshNow();
  }

  public getImage(deviceId: string): Buffer | undefined {
    return this.coordinator?.getImage(deviceId);
  }

  private applySnapshot(snapshot: Snapshot) {
    const available = this.coordinator?.isAvailable() ?? true;
    const seen = new Set<string>();

    for (const entry of snapshot.entries.values()) {
      const { device } = entry;
      const uuid = this.api.hap.uuid.generate(device.device_id);
      seen.add(uuid);

      let handler = this.accessoryHandlers.get(uuid);
      if (!handler) {
        const existingAccessory = this.accessories.find(accessory => accessory.UUID === uuid);
        if (existingAccessory) {
          this.log.info('Restoring existing accessory from cache:', device.display_name);
          existingAccessory.context = { device_id: device.device_id, display_name: device.display_name };
          handler = new TrailCameraAccessory(this, existingAccessory);
        } else {
          this.log.info('Registering new accessory:', device.display_name);
          const accessory = new this.api.platformAccessory<TrailCameraContext>(device.display_name, uuid);
          accessory.context = { device_id: device.device_id, display_name: device.display_name };
          handler = new TrailCameraAccessory(this, accessory);
          this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
          this.accessories.push(accessory);
        }
        this.accessoryHandlers.set(uuid, handler);
      }

      handler.update(entry, available);
    }

    this.api.updatePlatformAccessories(this.accessories.filter(accessory => seen.has(accessory.UUID)));

    if (!this.pruned) {
      this.pruned = true;
      const stale = this.accessories.filter(accessory => !seen.has(accessory.UUID));
      if (stale.length > 0) {
        this.log.info('Unregistering stale accessories:', stale.map(a => a.displayName));
        this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
        this.accessories.splice(0, this.accessories.length, ...this.accessories.filter(a => seen.has(a.UUID)));
      }
    }
  }
}
