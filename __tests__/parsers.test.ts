import {
  buildDeviceState,
  cameraDisplayName,
  createMediaReference,
  isMediaExpired,
  parseCamera,
  parseHealth,
  parseWeather,
  presignedIssuedAt,
  recentAverage,
  toNumber,
  toVoltage,
} from '../src/api/parsers';
import { MEDIA_URL_LIFETIME_MS } from '../src/api/constants';

describe('parsers', () => {
  describe('toNumber', () => {
    it('should accept numbers and numeric strings only', () => {
      expect(toNumber(42)).toBe(42);
      expect(toNumber('3.5')).toBe(3.5);
      expect(toNumber('')).toBeUndefined();
      expect(toNumber('n/a')).toBeUndefined();
      expect(toNumber(Number.NaN)).toBeUndefined();
      expect(toNumber(null)).toBeUndefined();
    });
  });

  describe('parseCamera', () => {
    it('should fall back through the display name sources', () => {
      expect(cameraDisplayName({ cameraName: 'Creek', cameraLocation: 'East' }, 'X1')).toBe('Creek');
      expect(cameraDisplayName({ cameraName: '', cameraLocation: 'East' }, 'X1')).toBe('East');
      expect(cameraDisplayName({ name: 'Legacy' }, 'X1')).toBe('Legacy');
      expect(cameraDisplayName({}, 'CAM-00917')).toBe('Camera 0917');
    });

    it('should skip entries without a camera id', () => {
      expect(parseCamera({ cameraName: 'Orphan' })).toBeUndefined();
    });

    it('should default the status to active', () => {
      expect(parseCamera({ cameraId: 'CAM01' })?.status).toBe('active');
      expect(parseCamera({ cameraId: 'CAM01', status: { status: 'suspended' } })?.status).toBe('suspended');
    });
  });

  describe('parseHealth', () => {
    it('should read the status and usage objects', () => {
      const health = parseHealth({
        cameraId: 'CAM01',
        phoneCarrier: 'Verizon',
        status: {
          memory: 7500,
          memoryLimit: 30000,
          voltagesource: 'Solar',
          voltageexternal: '6.2V',
          voltageinternal: '12.1v',
          lastTransmissionTimestamp: 1_756_000_000_000,
          temperature: 21,
          servingCell: 'FDD LTE,311480,LTE BAND 4,2350,-79,221,-15',
          mcuVersion: 'M1.0',
          appVersion: 'A2.3',
          eSim: [{ carrier: 'Verizon', activeFlag: 0 }, { carrier: 'AT&T', activeFlag: '1' }],
        },
        usage: { photos: 120, storedPhotos: '20' },
      });

      expect(health).toEqual({
        memory_used_mb: 7500,
        memory_total_mb: 30000,
        power_source: 'Solar',
        external_voltage: 6.2,
        internal_voltage: 12.1,
        last_transmission: 1_756_000_000_000,
        camera_temperature: 21,
        sim_carrier: 'AT&T',
        network_type: 'FDD LTE',
        network_band: 'LTE BAND 4',
        mcu_version: 'M1.0',
        app_version: 'A2.3',
        photos_taken: 120,
        photos_stored: 20,
      });
    });

    it('should fall back to the phone carrier without an active SIM', () => {
      const health = parseHealth({ cameraId: 'CAM01', phoneCarrier: 'Verizon', status: { eSim: [] } });

      expect(health?.sim_carrier).toBe('Verizon');
    });

    it('should leave the network out for a short serving cell string', () => {
      const health = parseHealth({ cameraId: 'CAM01', status: { servingCell: 'LTE' } });

      expect(health?.network_type).toBeUndefined();
      expect(health?.network_band).toBeUndefined();
    });

    it('should be undefined for a camera without status or usage objects', () => {
      expect(parseHealth({ cameraId: 'CAM01', status: 'active' })).toBeUndefined();
      expect(parseCamera({ cameraId: 'CAM01', status: 'active' })?.health).toBeUndefined();
    });

    it('should be attached to the parsed camera', () => {
      expect(parseCamera({ cameraId: 'CAM01', usage: { photos: 3 } })?.health).toEqual({ photos_taken: 3 });
    });
  });

  describe('toVoltage', () => {
    it('should strip the unit suffix', () => {
      expect(toVoltage('12.6V')).toBe(12.6);
      expect(toVoltage(' 6.0 v ')).toBe(6);
      expect(toVoltage(4.2)).toBe(4.2);
      expect(toVoltage('V')).toBeUndefined();
    });
  });

  describe('parseWeather', () => {
    it('should read nested wind and alternative field names', () => {
      expect(parseWeather({
        temperature: '41',
        weatherLabel: 'Snow',
        windDirection: { speed: 12, cardinalLabel: 'NNE' },
        windGust: 20,
        pressure: 29.8,
        pressureTendency: 'falling',
        sunPhase: 'Night',
        past24HoursTemperatureDeparture: -6,
      })).toEqual({
        temperature: 41,
        conditions: 'Snow',
        wind_speed: 12,
        wind_direction: 'NNE',
        wind_gust: 20,
        pressure: 29.8,
        pressure_tendency: 'falling',
        sun_phase: 'Night',
        temp_departure_24h: -6,
      });
    });

    it('should prefer the flat 12 hour range and departure keys', () => {
      expect(parseWeather({
        tempMin12hr: 48,
        tempMax12hr: '66',
        temperatureRange12Hours: { min: 40, max: 70 },
        tempDepature24hr: 3,
        past24HoursTemperatureDeparture: -1,
      })).toEqual({
        temp_min_12h: 48,
        temp_max_12h: 66,
        temp_departure_24h: 3,
      });
    });

    it('should return an empty snapshot without weather data', () => {
      expect(parseWeather(undefined)).toEqual({});
    });
  });

  describe('recentAverage', () => {
    it('should average the ten most recent non-zero readings', () => {
      const values = [5, 0, 4, undefined, 4, 5, 5, 4, 3, 5, 1, 1];

      // First ten: 5, 0, 4, -, 4, 5, 5, 4, 3, 5 -> eight readings summing to 35.
      expect(recentAverage(values)).toBe(35 / 8);
    });

    it('should be undefined when no reading is present', () => {
      expect(recentAverage([0, undefined])).toBeUndefined();
    });
  });

  describe('buildDeviceState', () => {
    it('should use the weather record and metadata GPS fallbacks', () => {
      const state = buildDeviceState([
        {
          photoDateUtc: '2025-08-20T05:00:00Z',
          metadata: { batteryLevel: 77.9, signal: '2' },
          gpsLocation: { lat: 45.1, lon: -93.2 },
          weatherRecord: { temp: 50 },
        },
      ]);

      expect(state).toEqual({
        battery_level: 77,
        battery_level_avg: 77,
        signal_strength: 2,
        signal_strength_avg: 2,
        gps_coordinates: { latitude: 45.1, longitude: -93.2 },
        total_photo_count: 1,
        last_photo_time: '2025-08-20T05:00:00Z',
        weather: { temperature: 50 },
      });
    });

    it('should leave GPS out when only one coordinate is known', () => {
      const state = buildDeviceState([{ metadata: { gpsLatitude: 45.1 } }]);

      expect(state.gps_coordinates).toBeUndefined();
    });
  });

  describe('media references', () => {
    it('should read the signing time from X-Amz-Date', () => {
      expect(presignedIssuedAt('https://photos.example.com/a.jpg?X-Amz-Date=20250101T000001Z'))
        .toBe(Date.UTC(2025, 0, 1, 0, 0, 1));
      expect(presignedIssuedAt('https://photos.example.com/a.jpg?X-Amz-Date=yesterday')).toBeUndefined();
      expect(presignedIssuedAt('not a url')).toBeUndefined();
    });

    it('should expire seven days after issue', () => {
      const ref = createMediaReference('CAM01', 'https://photos.example.com/a.jpg', 1_000);

      expect(ref).toEqual({
        device_id: 'CAM01',
        remote_url: 'https://photos.example.com/a.jpg',
        issued_at: 1_000,
        expires_at: 1_000 + MEDIA_URL_LIFETIME_MS,
      });
      expect(Object.isFrozen(ref)).toBe(true);
    });

    it('should count the expiry instant itself as expired', () => {
      const ref = createMediaReference('CAM01', 'https://photos.example.com/a.jpg', 0);

      expect(isMediaExpired(ref, MEDIA_URL_LIFETIME_MS - 1)).toBe(false);
      expect(isMediaExpired(ref, MEDIA_URL_LIFETIME_MS)).toBe(true);
    });
  });
});
