import { DataQualityError } from '../common/errors';
import { Sample } from '../decoding/interfaces/decoder.interface';
import {
  CLIP_ACCEL_THRESHOLD,
  emptyMetrics,
  FlightMetrics,
  MOTOR_COUNT,
  MOTOR_THRESHOLDS,
  MotorSaturation,
  PEAK_ACCEL_THRESHOLD,
  SATURATION_EPSILON,
  VIBRATION_BIN_EDGES,
  VibrationBins,
  vibrationShares,
} from './dto/log-summary.dto';

export const ACCEL_TOPIC = 'sensor_accel';

/** Topics that may carry normalized motor outputs, in order of preference on ties */
export const MOTOR_TOPICS = [
  'actuator_outputs',
  'actuator_motors',
  'fmu_outputs',
  'actuator_controls_0',
] as const;

/** Everything the extractor reads; decoders may skip the rest */
export const EXTRACTOR_TOPICS: ReadonlySet<string> = new Set<string>([
  ACCEL_TOPIC,
  ...MOTOR_TOPICS,
]);

const CLIP_COUNTER_FIELDS = [
  'clip_counter',
  'clip_counter[0]',
  'clip_counter[1]',
  'clip_counter[2]',
];

interface AccelPoint {
  timestampUs: number;
  /** null when the magnitude is not finite */
  bin: number | null;
  clipping: boolean;
}

interface AccelSeries {
  samples: number;
  previous: AccelPoint | null;
  trackedS: number;
  vibrationS: VibrationBins;
  peakCount: number;
  clipCount: number;
  clipDurationS: number;
  invalid: string | null;
}

interface MotorSeries {
  topicRank: number;
  samples: number;
  previousTimestampUs: number | null;
  previousValues: number[];
  saturationS: MotorSaturation[];
  invalid: string | null;
}

function binFor(magnitude: number): number {
  let bin = 0;
  while (bin < VIBRATION_BIN_EDGES.length && magnitude >= VIBRATION_BIN_EDGES[bin]) {
    bin++;
  }
  return bin;
}

function motorTopicRank(topic: string): number {
  return MOTOR_TOPICS.findIndex((candidate) => candidate === topic);
}

/**
 * MetricExtractor
 *
 * Incremental fold over one log's samples. Every series (topic + instance)
 * of interest keeps only its previous sample and running sums, so memory
 * does not grow with log length. At the end the accelerometer and motor
 * series with the most samples are reported, except clipping, which comes
 * from whichever accelerometer clipped most.
 *
 * Time accounting: sample i is charged t(i+1) − t(i); the last sample of a
 * series is charged nothing.
 *
 * Not shared: one extractor per log, owned by the worker processing it.
 */
export class MetricExtractor {
  private readonly accel = new Map<number, AccelSeries>();
  private readonly motors = new Map<string, MotorSeries>();

  consume(sample: Sample): void {
    if (sample.topic === ACCEL_TOPIC) {
      this.consumeAccel(sample);
      return;
    }
    const rank = motorTopicRank(sample.topic);
    if (rank >= 0) {
      this.consumeMotor(sample, rank);
    }
  }

  /**
   * @throws DataQualityError when the selected series has bad timing or
   *   any metric ends up negative or not finite
   */
  finish(): FlightMetrics {
    const metrics = emptyMetrics();

    const accel = this.pickAccel();
    if (accel) {
      if (accel.invalid) {
        throw new DataQualityError(accel.invalid);
      }
      metrics.durationTrackedS = accel.trackedS;
      metrics.vibrationS = [...accel.vibrationS];
      metrics.vibrationShare = vibrationShares(accel.vibrationS, accel.trackedS);
      metrics.peakAccelCount = accel.peakCount;

      const clipping = this.pickClipping(accel);
      metrics.clipCount = clipping.clipCount;
      metrics.clipDurationS = clipping.clipDurationS;
    }

    const motor = this.pickMotor();
    if (motor) {
      if (motor.invalid) {
        throw new DataQualityError(motor.invalid);
      }
      metrics.motorSaturationS = motor.saturationS.map(
        (thresholds): MotorSaturation => [...thresholds],
      );
    }

    validateMetrics(metrics);
    return metrics;
  }

  private consumeAccel(sample: Sample): void {
    const series = this.accel.get(sample.instance) ?? this.addAccelSeries(sample.instance);
    series.samples++;
    if (series.invalid) {
      return;
    }

    const { previous } = series;
    if (previous) {
      const dt = (sample.timestampUs - previous.timestampUs) / 1e6;
      if (!Number.isFinite(dt) || dt < 0) {
        series.invalid = timingError(
          `${ACCEL_TOPIC}[${sample.instance}]`,
          previous.timestampUs,
          sample.timestampUs,
        );
        return;
      }
      if (previous.bin !== null) {
        series.vibrationS[previous.bin] += dt;
        series.trackedS += dt;
      }
      if (previous.clipping) {
        series.clipDurationS += dt;
      }
    }

    const { x, y, z } = sample.values;
    const magnitude = Math.sqrt(x * x + y * y + z * z);
    const finite = Number.isFinite(magnitude);

    if (finite && magnitude > PEAK_ACCEL_THRESHOLD) {
      series.peakCount++;
    }

    const clipping = isClipping(sample.values);
    if (clipping && !(previous?.clipping ?? false)) {
      series.clipCount++;
    }

    series.previous = {
      timestampUs: sample.timestampUs,
      bin: finite ? binFor(magnitude) : null,
      clipping,
    };
  }

  private consumeMotor(sample: Sample, topicRank: number): void {
    const key = `${sample.topic}/${sample.instance}`;
    const series = this.motors.get(key) ?? this.addMotorSeries(key, topicRank);
    series.samples++;
    if (series.invalid) {
      return;
    }

    if (series.previousTimestampUs !== null) {
      const dt = (sample.timestampUs - series.previousTimestampUs) / 1e6;
      if (!Number.isFinite(dt) || dt < 0) {
        series.invalid = timingError(key, series.previousTimestampUs, sample.timestampUs);
        return;
      }
      series.previousValues.forEach((value, motor) => {
        if (!Number.isFinite(value)) {
          return;
        }
        MOTOR_THRESHOLDS.forEach((threshold, t) => {
          const limit = threshold === 1 ? 1 - SATURATION_EPSILON : threshold;
          if (value >= limit) {
            series.saturationS[motor][t] += dt;
          }
        });
      });
    }

    series.previousTimestampUs = sample.timestampUs;
    series.previousValues = Array.from({ length: MOTOR_COUNT }, (_, motor) =>
      motorValue(sample.values, motor),
    );
  }

  private addAccelSeries(instance: number): AccelSeries {
    const series: AccelSeries = {
      samples: 0,
      previous: null,
      trackedS: 0,
      vibrationS: [0, 0, 0, 0],
      peakCount: 0,
      clipCount: 0,
      clipDurationS: 0,
      invalid: null,
    };
    this.accel.set(instance, series);
    return series;
  }

  private addMotorSeries(key: string, topicRank: number): MotorSeries {
    const series: MotorSeries = {
      topicRank,
      samples: 0,
      previousTimestampUs: null,
      previousValues: [],
      saturationS: Array.from({ length: MOTOR_COUNT }, (): MotorSaturation => [0, 0, 0]),
      invalid: null,
    };
    this.motors.set(key, series);
    return series;
  }

  private pickAccel(): AccelSeries | null {
    let best: AccelSeries | null = null;
    for (const series of this.accel.values()) {
      if (!best || series.samples > best.samples) {
        best = series;
      }
    }
    return best;
  }

  /** Most clip events, then longest clip time; ties keep `reported` */
  private pickClipping(reported: AccelSeries): AccelSeries {
    let worst = reported;
    for (const series of this.accel.values()) {
      if (series.invalid) {
        continue;
      }
      if (
        series.clipCount > worst.clipCount ||
        (series.clipCount === worst.clipCount && series.clipDurationS > worst.clipDurationS)
      ) {
        worst = series;
      }
    }
    return worst;
  }

    private pickMotor(): MotorSeries | null {
    let best: MotorSeries | null = null;
    for (const series of this.motors.values()) {
      if (
        !best ||
        series.samples > best.samples ||
        (series.samples === best.samples && series.topicRank < best.topicRank)
      ) {
        best = series;
      }
    }
    return best;
  }
}

/**
 * Channel value for motor `index`: output[i], control[i], output{i} or
 * control{i}; a bare `output` counts as motor 0. NaN when absent.
 */
function motorValue(values: Readonly<Record<string, number>>, index: number): number {
  const candidates = [
    `output[${index}]`,
    `control[${index}]`,
    `output${index}`,
    `control${index}`,
    ...(index === 0 ? ['output'] : []),
  ];
  for (const key of candidates) {
    const value = values[key];
    if (value !== undefined) {
      return value;
    }
  }
  return Number.NaN;
}

function isClipping(values: Readonly<Record<string, number>>): boolean {
  for (const axis of ['x', 'y', 'z']) {
    const value = values[axis];
    if (Number.isFinite(value) && Math.abs(value) > CLIP_ACCEL_THRESHOLD) {
      return true;
    }
  }
  return CLIP_COUNTER_FIELDS.some((field) => (values[field] ?? 0) > 0);
}

function timingError(series: string, fromUs: number, toUs: number): string {
  return `Timestamps go backwards or are not finite in ${series}: ${fromUs} -> ${toUs}`;
}

/**
 * Every time metric and count must be finite and non-negative.
 */
export function validateMetrics(metrics: FlightMetrics): void {
  const entries: Array<[string, number]> = [
    ['duration_tracked_s', metrics.durationTrackedS],
    ...metrics.vibrationS.map((value, i): [string, number] => [`vibration[${i}]`, value]),
    ...metrics.vibrationShare.map((value, i): [string, number] => [`share[${i}]`, value]),
    ...metrics.motorSaturationS.flatMap((thresholds, motor) =>
      thresholds.map((value, t): [string, number] => [`motor${motor}[${t}]`, value]),
    ),
    ['peak_accel_count', metrics.peakAccelCount],
    ['clip_count', metrics.clipCount],
    ['clip_duration_s', metrics.clipDurationS],
  ];

  const invalid = entries.filter(([, value]) => !Number.isFinite(value) || value < 0);
  if (invalid.length > 0) {
    const detail = invalid
      .slice(0, 5)
      .map(([key, value]) => `${key}=${value}`)
      .join(', ');
    throw new DataQualityError(
      `Negative or invalid metrics (${detail}${invalid.length > 5 ? ', ...' : ''})`,
    );
  }
}
