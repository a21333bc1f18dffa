/**
 * RiskRecord
 *
 * One vehicle's scores. Components and composite are on a 0-100 scale;
 * rates are per hour of tracked flight.
 */
export interface RiskRecord {
  vehicleId: string;
  dead: boolean;
  fatigueScore: number;
  motorScore: number;
  vibrationScore: number;
  compositeScore: number;
  /** 1-based; null for dead vehicles */
  rank: number | null;
  peakEventsPerHour: number;
  clipEventsPerHour: number;
  /** Share of tracked time above 70 m/s², in percent */
  vibrationHighPct: number;
  /** Saturated motor-seconds (>= 1.0) over tracked seconds, in percent */
  motorSaturationPct: number;
  peakAccelCount: number;
  clipCount: number;
  flightTimeMin: number;
  logCount: number;
}
