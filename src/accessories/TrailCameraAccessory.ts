import {
  CameraControllerOptions,
  CameraStreamingDelegate,
  CharacteristicValue,
  PlatformAccessory,
  PrepareStreamCallback,
  PrepareStreamRequest,
  Service,
  SnapshotRequest,
  SnapshotRequestCallback,
  StreamRequestCallback,
  StreamingRequest,
} from 'homebridge';
import type { CellCamPlatform } from '../platform';
import { MISSING_STATUS } from '../api/types';
import { hasExternalPower } from '../api/health';
import { AttributeValue, toEntityAttributes } from '../entityAttributes';
import { SnapshotEntry } from '../sync/SyncCoordinator';

export interface TrailCameraContext {
  device_id: string;
  display_name: string;
  attributes?: Record<string, AttributeValue>;
}

interface AccessoryState {
  batteryLevel: number;
  lowBattery: boolean;
  charging: boolean;
  temperature: number;
  fault: boolean;
  motion: boolean;
  lastPhotoTime?: string;
}

const LOW_BATTERY_PERCENT = 20;
const MOTION_PULSE_MS = 30 * 1000;
const FIRMWARE_FORMAT = /^\d+(\.\d+){0,2}$/;

export function fahrenheitToCelsius(fahrenheit: number): number {
  return Math.round(((fahrenheit - 32) * 5 / 9) * 10) / 10;
}

/**
 * One Reveal camera: latest photo as a camera snapshot, battery, weather temperature,
 * a motion pulse per new photo and a momentary switch that requests a refresh.
 */
export class TrailCameraAccessory implements CameraStreamingDelegate {
  private readonly batteryService: Service;
  private readonly temperatureService: Service;
  private readonly motionService: Service;
  private readonly refreshService: Service;
  private motionTimer?: NodeJS.Timeout;
  private refreshResetTimer?: NodeJS.Timeout;

  private state: AccessoryState = {
    batteryLevel: 100,
    lowBattery: false,
    charging: false,
    temperature: 0,
    fault: false,
    motion: false,
  };

  constructor(
    private readonly platform: CellCamPlatform,
    public readonly accessory: PlatformAccessory<TrailCameraContext>,
  ) {
    const { Service, Characteristic } = this.platform;

    this.accessory.getService(Service.AccessoryInformation)
      ?.setCharacteristic(Characteristic.Manufacturer, 'Tactacam')
      .setCharacteristic(Characteristic.Model, 'Reveal Cell Cam')
      .setCharacteristic(Characteristic.SerialNumber, accessory.context.device_id);

    this.batteryService = this.accessory.getService(Service.Battery)
      || this.accessory.addService(Service.Battery);
    this.batteryService.getCharacteristic(Characteristic.BatteryLevel)
      .onGet(() => this.state.batteryLevel);
    this.batteryService.getCharacteristic(Characteristic.StatusLowBattery)
      .onGet(() => this.lowBatteryValue());
    this.batteryService.getCharacteristic(Characteristic.ChargingState)
      .onGet(() => this.chargingValue());

    this.temperatureService = this.accessory.getService(Service.TemperatureSensor)
      || this.accessory.addService(Service.TemperatureSensor);
    this.temperatureService.setCharacteristic(Characteristic.Name, `${accessory.context.display_name} Temperature`);
    this.temperatureService.getCharacteristic(Characteristic.CurrentTemperature)
      .setProps({ minValue: -50, maxValue: 60 })
      .onGet(() => this.state.temperature);
    this.temperatureService.getCharacteristic(Characteristic.StatusFault)
      .onGet(() => this.faultValue());

    this.motionService = this.accessory.getService(Service.MotionSensor)
      || this.accessory.addService(Service.MotionSensor);
    this.motionService.getCharacteristic(Characteristic.MotionDetected)
      .onGet(() => this.state.motion);

    this.refreshService = this.accessory.getService(Service.Switch)
      || this.accessory.addService(Service.Switch, `${accessory.context.display_name} Refresh`);
    this.refreshService.getCharacteristic(Characteristic.On)
      .onGet(() => false)
      .onSet((value) => this.handleRefresh(value));

    const options: CameraControllerOptions = {
      cameraStreamCount: 1,
      delegate: this,
      streamingOptions: {
        supportedCryptoSuites: [this.platform.api.hap.SRTPCryptoSuites.AES_CM_128_HMAC_SHA1_80],
        video: {
          resolutions: [[1920, 1080, 30], [1280, 720, 30], [640, 360, 30]],
          codec: {
            profiles: [this.platform.api.hap.H264Profile.MAIN],
            levels: [this.platform.api.hap.H264Level.LEVEL3_1],
          },
        },
      },
    };
    this.accessory.configureController(new this.platform.api.hap.CameraController(options));
  }

  public get deviceId(): string {
    return this.accessory.context.device_id;
  }

  private lowBatteryValue(): number {
    const { StatusLowBattery } = this.platform.Characteristic;
    return this.state.lowBattery ? StatusLowBattery.BATTERY_LEVEL_LOW : StatusLowBattery.BATTERY_LEVEL_NORMAL;
  }

  private chargingValue(): number {
    const { ChargingState } = this.platform.Characteristic;
    return this.state.charging ? ChargingState.CHARGING : ChargingState.NOT_CHARGING;
  }

  private faultValue(): number {
    const { StatusFault } = this.platform.Characteristic;
    return this.state.fault ? StatusFault.GENERAL_FAULT : StatusFault.NO_FAULT;
  }

  private handleRefresh(value: CharacteristicValue): void {
    if (value !== true) {
      return;
    }
    this.platform.log.info(`[${this.accessory.displayName}] Refresh requested.`);
    this.platform.requestRefresh();
    this.refreshResetTimer = setTimeout(() => {
      this.refreshResetTimer = undefined;
      this.refreshService.updateCharacteristic(this.platform.Characteristic.On, false);
    }, 1000);
  }

  /**
   * Applies one snapshot entry. `available` is false during sustained authentication failure.
   */
  public update(entry: SnapshotEntry, available: boolean): void {
    const { Characteristic } = this.platform;
    const { device, state } = entry;

    this.accessory.context.display_name = device.display_name;
    this.accessory.context.attributes = toEntityAttributes(entry);

    const info = this.accessory.getService(this.platform.Service.AccessoryInformation);
    if (device.model) {
      info?.updateCharacteristic(Characteristic.Model, device.model);
    }
    if (device.firmware_version && FIRMWARE_FORMAT.test(device.firmware_version)) {
      info?.updateCharacteristic(Characteristic.FirmwareRevision, device.firmware_version);
    }

    this.setFault(!available || device.status === MISSING_STATUS);

    if (state?.battery_level !== undefined) {
      this.updateBattery(state.battery_level);
    }

    // Solar or mains supply
    if (device.health) {
      const charging = hasExternalPower(device.health);
      if (this.state.charging !== charging) {
        this.state.charging = charging;
        this.batteryService.updateCharacteristic(Characteristic.ChargingState, this.chargingValue());
      }
    }

    const temperature = state?.weather.temperature;
    if (temperature !== undefined) {
      const celsius = fahrenheitToCelsius(temperature);
      if (this.state.temperature !== celsius) {
        this.state.temperature = celsius;
        this.temperatureService.updateCharacteristic(Characteristic.CurrentTemperature, celsius);
      }
    }

    const lastPhotoTime = state?.last_photo_time;
    if (lastPhotoTime && this.state.lastPhotoTime && lastPhotoTime > this.state.lastPhotoTime) {
      this.pulseMotion();
    }
    if (lastPhotoTime) {
      this.state.lastPhotoTime = lastPhotoTime;
    }
  }

  public setAvailable(available: boolean): void {
    const missing = this.accessory.context.attributes?.status === MISSING_STATUS;
    this.setFault(!available || missing);
  }

  private setFault(fault: boolean): void {
    if (this.state.fault === fault) {
      return;
    }
    this.state.fault = fault;
    this.temperatureService.updateCharacteristic(this.platform.Characteristic.StatusFault, this.faultValue());
    this.platform.log.info(`[${this.accessory.displayName}] ${fault ? 'Unavailable' : 'Available again'}.`);
  }

  private updateBattery(level: number): void {
    const clamped = Math.min(100, Math.max(0, level));
    const low = clamped <= LOW_BATTERY_PERCENT;

    if (this.state.batteryLevel !== clamped) {
      this.state.batteryLevel = clamped;
      this.batteryService.updateCharacteristic(this.platform.Characteristic.BatteryLevel, clamped);
      this.platform.log.debug(`[${this.accessory.displayName}] Battery level updated to ${clamped}%`);
    }

    if (this.state.lowBattery !== low) {
      this.state.lowBattery = low;
      this.batteryService.updateCharacteristic(this.platform.Characteristic.StatusLowBattery, this.lowBatteryValue());
      this.platform.log.info(`[${this.accessory.displayName}] Low battery status changed to: ${low ? 'LOW' : 'NORMAL'}`);
    }
  }

  private pulseMotion(): void {
    this.platform.log.info(`[${this.accessory.displayName}] New photo captured.`);
    this.state.motion = true;
    this.motionService.updateCharacteristic(this.platform.Characteristic.MotionDetected, true);
    if (this.motionTimer) {
      clearTimeout(this.motionTimer);
    }
    this.motionTimer = setTimeout(() => {
      this.motionTimer = undefined;
      this.state.motion = false;
      this.motionService.updateCharacteristic(this.platform.Characteristic.MotionDetected, false);
    }, MOTION_PULSE_MS);
  }

  public dispose(): void {
    if (this.motionTimer) {
      clearTimeout(this.motionTimer);
      this.motionTimer = undefined;
    }
    if (this.refreshResetTimer) {
      clearTimeout(this.refreshResetTimer);
      this.refreshResetTimer = undefined;
    }
  }

  public handleSnapshotRequest(_request: SnapshotRequest, callback: SnapshotRequestCallback): void {
    const image = this.platform.getImage(this.deviceId);
    if (image) {
      callback(undefined, image);
    } else {
      callback(new Error(`No photo cached yet for ${this.accessory.displayName}.`));
    }
  }

  public prepareStream(_request: PrepareStreamRequest, callback: PrepareStreamCallback): void {
    callback(new Error('Trail cameras do not support live streaming.'));
  }

  public handleStreamRequest(_request: StreamingRequest, callback: StreamRequestCallback): void {
    callback(new Error('Trail cameras do not support live streaming.'));
  }
}
