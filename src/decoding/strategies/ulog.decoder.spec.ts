import { CorruptFormatError } from '../../common/errors';
import { chunksOf, collect } from '../../../test/utils/test-helpers';
import {
  ACTUATOR_MOTORS_FIELDS,
  SENSOR_ACCEL_FIELDS,
  ULogBuilder,
} from '../../../test/utils/ulog-builder';
import { ULogDecoder } from './ulog.decoder';

describe('ULogDecoder', () => {
  let decoder: ULogDecoder;

  beforeEach(() => {
    decoder = new ULogDecoder();
  });

  const accelLog = () =>
    new ULogBuilder(1_000)
      .message('B', Buffer.alloc(40))
      .info('sys_name', 'PX4')
      .format('sensor_accel', SENSOR_ACCEL_FIELDS)
      .format('actuator_motors', ACTUATOR_MOTORS_FIELDS)
      .data('sensor_accel', 0, {
        timestamp: 1_000_000,
        device_id: 7,
        x: 1.5,
        y: -2.25,
        z: 9.75,
        clip_counter: [0, 2, 0],
      })
      .data('actuator_motors', 0, {
        timestamp: 1_000_500,
        control: [0.5, 0.75, 1, 0.25],
      })
      .data('sensor_accel', 1, { timestamp: 1_002_000, x: 0, y: 0, z: 0 })
      .build();

  describe('canHandle', () => {
    it('should accept the ULog magic bytes', () => {
      expect(decoder.canHandle('flight.bin', accelLog().subarray(0, 64))).toBe(true);
    });

    it('should reject CSV content', () => {
      expect(
        decoder.canHandle('flight.ulg', Buffer.from('timestamp_us,topic\n')),
      ).toBe(false);
    });

    it('should reject a head shorter than the magic', () => {
      expect(decoder.canHandle('flight.ulg', Buffer.from('ULo'))).toBe(false);
    });
  });

  describe('decode', () => {
    it('should decode samples with flattened arrays', async () => {
      const samples = await collect(decoder.decode(chunksOf(accelLog(), 4096)));

      expect(samples).toHaveLength(3);
      expect(samples[0]).toEqual({
        topic: 'sensor_accel',
        instance: 0,
        timestampUs: 1_000_000,
        values: {
          device_id: 7,
          x: 1.5,
          y: -2.25,
          z: 9.75,
          'clip_counter[0]': 0,
          'clip_counter[1]': 2,
          'clip_counter[2]': 0,
        },
      });
      expect(samples[1].topic).toBe('actuator_motors');
      expect(samples[1].values['control[0]']).toBe(0.5);
      expect(samples[1].values['control[2]']).toBe(1);
      expect(samples[1].values['control[11]']).toBe(0);
      expect(samples[2]).toMatchObject({ instance: 1, timestampUs: 1_002_000 });
    });

    it('should produce the same samples whatever the chunk size', async () => {
      const whole = await collect(decoder.decode(chunksOf(accelLog(), 1 << 20)));
      const byteByByte = await collect(decoder.decode(chunksOf(accelLog(), 1)));
      const oddChunks = await collect(decoder.decode(chunksOf(accelLog(), 7)));

      expect(byteByByte).toEqual(whole);
      expect(oddChunks).toEqual(whole);
    });

    it('should skip topics outside the requested set', async () => {
      const samples = await collect(
        decoder.decode(chunksOf(accelLog(), 64), {
          topics: new Set(['actuator_motors']),
        }),
      );

      expect(samples.map((s) => s.topic)).toEqual(['actuator_motors']);
    });

    it('should flatten nested formats and ignore padding and chars', async () => {
      const log = new ULogBuilder()
        .format('vec3', ['float x', 'float y', 'float z'])
        .format('imu_status', [
          'uint64_t timestamp',
          'vec3[2] accel',
          'char[4] tag',
          'uint8_t[2] _padding0',
          'bool healthy',
        ])
        .subscribe('imu_status');
      const body = Buffer.alloc(8 + 24 + 4 + 2 + 1);
      body.writeBigUInt64LE(BigInt(42), 0);
      body.writeFloatLE(1, 8);
      body.writeFloatLE(2, 12);
      body.writeFloatLE(3, 16);
      body.writeFloatLE(4, 20);
      body.writeFloatLE(5, 24);
      body.writeFloatLE(6, 28);
      body.write('abcd', 32, 'latin1');
      body.writeUInt8(9, 36);
      body.writeUInt8(3, 38);
      log.rawData('imu_status', 0, body);

      const [sample] = await collect(decoder.decode(chunksOf(log.build(), 16)));

      expect(sample).toEqual({
        topic: 'imu_status',
        instance: 0,
        timestampUs: 42,
        values: {
          'accel[0].x': 1,
          'accel[0].y': 2,
          'accel[0].z': 3,
          'accel[1].x': 4,
          'accel[1].y': 5,
          'accel[1].z': 6,
          healthy: 1,
        },
      });
    });

    it('should stop cleanly at a truncated final message', async () => {
      const full = accelLog();
      const truncated = full.subarray(0, full.length - 5);

      const samples = await collect(decoder.decode(chunksOf(truncated, 32)));

      expect(samples).toHaveLength(2);
    });

    it('should reject content without the magic bytes', async () => {
      const junk = Buffer.alloc(64, 0x41);

      await expect(collect(decoder.decode(chunksOf(junk, 16)))).rejects.toThrow(
        CorruptFormatError,
      );
    });

    it('should reject a truncated header', async () => {
      const head = accelLog().subarray(0, 10);

      await expect(collect(decoder.decode(chunksOf(head, 16)))).rejects.toThrow(
        'Truncated ULog header',
      );
    });

    it('should reject a log with no logged topics', async () => {
      const log = new ULogBuilder().info('sys_name', 'PX4').build();

      await expect(collect(decoder.decode(chunksOf(log, 64)))).rejects.toThrow(
        'ULog contains no logged topics',
      );
    });

    it('should reject a subscription to an undefined format', async () => {
      const log = new ULogBuilder().subscribe('sensor_accel').build();

      await expect(collect(decoder.decode(chunksOf(log, 64)))).rejects.toThrow(
        'Unknown format sensor_accel',
      );
    });

    it('should reject a format without a timestamp', async () => {
      const log = new ULogBuilder()
        .format('battery_status', ['float voltage_v'])
        .subscribe('battery_status')
        .build();

      await expect(collect(decoder.decode(chunksOf(log, 64)))).rejects.toThrow(
        'Format battery_status has no uint64_t timestamp field',
      );
    });

    it('should reject a data payload shorter than its format', async () => {
      const log = new ULogBuilder()
        .format('sensor_accel', SENSOR_ACCEL_FIELDS)
        .subscribe('sensor_accel')
        .rawData('sensor_accel', 0, Buffer.alloc(12))
        .build();

      await expect(collect(decoder.decode(chunksOf(log, 64)))).rejects.toThrow(
        CorruptFormatError,
      );
    });

    it('should count a data message for an unknown id as skipped', async () => {
      const log = new ULogBuilder()
        .format('sensor_accel', SENSOR_ACCEL_FIELDS)
        .subscribe('sensor_accel')
        .message('D', Buffer.from([0x09, 0x00, 0x01]))
        .build();

      await expect(collect(decoder.decode(chunksOf(log, 64)))).resolves.toEqual([]);
    });
  });
});
