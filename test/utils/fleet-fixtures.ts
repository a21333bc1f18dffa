import { createTelemetryCsv } from './csv-builder';
import {
  ACTUATOR_MOTORS_FIELDS,
  SENSOR_ACCEL_FIELDS,
  ULOG_MAGIC,
  ULogBuilder,
} from './ulog-builder';

/**
 * Two seconds of calm flight, all below 30 m/s²,
 * motors well under saturation.
 */
export function calmFlightCsv(): Buffer {
  return createTelemetryCsv([
    { timestampUs: 0, topic: 'sensor_accel', values: { x: 0.2, y: -0.1, z: 9.8 } },
    { timestampUs: 0, topic: 'actuator_motors', values: { 'control[0]': 0.5, 'control[1]': 0.5 } },
    { timestampUs: 1_000_000, topic: 'sensor_accel', values: { x: 0.1, y: 0.3, z: 9.7 } },
    { timestampUs: 2_000_000, topic: 'sensor_accel', values: { x: 0, y: 0, z: 9.8 } },
    { timestampUs: 2_000_000, topic: 'actuator_motors', values: { 'control[0]': 0.4, 'control[1]': 0.6 } },
  ]);
}

/**
 * One second above 70 m/s² with a clip, then one calm second; motor 0
 * saturated for the first second.
 */
export function roughFlightCsv(): Buffer {
  return createTelemetryCsv([
    { timestampUs: 0, topic: 'sensor_accel', values: { x: 160, y: 0, z: 9.8 } },
    { timestampUs: 0, topic: 'actuator_motors', values: { 'control[0]': 1, 'control[1]': 0.5 } },
    { timestampUs: 1_000_000, topic: 'sensor_accel', values: { x: 0, y: 0, z: 9.8 } },
    { timestampUs: 1_000_000, topic: 'actuator_motors', values: { 'control[0]': 0.5, 'control[1]': 0.5 } },
    { timestampUs: 2_000_000, topic: 'sensor_accel', values: { x: 0, y: 0, z: 9.8 } },
    { timestampUs: 2_000_000, topic: 'actuator_motors', values: { 'control[0]': 0.5, 'control[1]': 0.5 } },
  ]);
}

/**
 * One second of calm flight as a ULog: accelerometer near 1 g, motors
 * between 0.45 and 0.6.
 */
export function calmFlightULog(startUs = 1_000_000): Buffer {
  const log = new ULogBuilder(startUs)
    .info('sys_name', 'PX4')
    .format('sensor_accel', SENSOR_ACCEL_FIELDS)
    .format('actuator_motors', ACTUATOR_MOTORS_FIELDS);

  for (let i = 0; i <= 4; i++) {
    const timestamp = startUs + i * 250_000;
    log.data('sensor_accel', 0, { timestamp, device_id: 1, x: 0.5, y: -0.5, z: 9.75 });
    log.data('actuator_motors', 0, { timestamp, control: [0.5, 0.55, 0.6, 0.45] });
  }
  return log.build();
}

/**
 * ULog magic followed by too few bytes for a header.
 */
export function truncatedULog(): Buffer {
  return Buffer.concat([ULOG_MAGIC, Buffer.from([1, 0, 0])]);
}
