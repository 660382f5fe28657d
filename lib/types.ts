/**
 * Space weather data model
 *
 * Upstream records are loosely typed and read through the accessors below;
 * everything derived from them is a plain, request-scoped value.
 */

// ============================================================================
// Raw upstream data
// ============================================================================

/** A DONKI event record (flare, CME, storm, radiation belt enhancement). */
export type RawEvent = Record<string, unknown>;

/**
 * A positional SWPC row with the header already stripped.
 * Solar wind: [timestamp, bx, by, bz, speed, density]. Kp: [timestamp, kp, ...].
 */
export type TimeSeriesRow = readonly unknown[];

export interface NeoFeed {
  near_earth_objects: Record<string, unknown>;
  [key: string]: unknown;
}

export interface CurrentConditions {
  timestamp: string;
  solar_wind: TimeSeriesRow[];
  kp_index: TimeSeriesRow[];
  xray_flux: TimeSeriesRow[];
}

// ============================================================================
// Severity vocabularies
// ============================================================================

export type SeverityTier = 'unknown' | 'low' | 'moderate' | 'high' | 'extreme';

export type FlareRiskLevel = 'MINIMAL' | 'LOW' | 'MODERATE' | 'HIGH';

export type OverallRiskLevel = 'LOW' | 'MODERATE' | 'ELEVATED' | 'HIGH';

export type RiskColor = 'green' | 'yellow' | 'orange' | 'red';

export type RadiationScale = 'Below S1' | 'S1-S2' | 'S3-S4';

export type RadiationSeverity = 'Minor' | 'Moderate' | 'Strong';

export type StormLevel = 'None' | 'Minor (G1) or None' | 'Moderate (G2-G3)' | 'Severe (G4-G5)';

export type ProtonTrend = 'increasing' | 'stable' | 'decreasing';

export type ProtonAlertLevel = 'Normal' | 'S1 - Minor' | 'S2 - Moderate' | 'S3 - Strong';

// ============================================================================
// Predictions
// ============================================================================

export interface FlareClassPrediction {
  probability: number;
  description: string;
  severity: 'low' | 'moderate' | 'high';
}

export interface FlarePrediction {
  timestamp: string;
  forecast_period: string;
  model_version: string;
  confidence: number;
  predictions: {
    C_class: FlareClassPrediction;
    M_class: FlareClassPrediction;
    X_class: FlareClassPrediction;
  };
  risk_level: FlareRiskLevel;
  overall_risk_score: number;
  recommendations: string[];
}

export interface GeomagneticStormPrediction {
  timestamp: string;
  current_kp: number;
  predicted_max_kp: number;
  storm_probability: number;
  storm_level: StormLevel;
  forecast_period: string;
  impacts: string[];
}

export interface RadiationStormPrediction {
  timestamp: string;
  forecast_period: string;
  radiation_storm_probability: number;
  predicted_scale: RadiationScale;
  severity: RadiationSeverity;
  confidence: number;
  impacts: string[];
  affected_regions: string[];
  recommendations: string[];
}

export interface ProtonFluxPrediction {
  timestamp: string;
  current_flux: string;
  predicted_flux_6h: string;
  trend: ProtonTrend;
  alert_level: ProtonAlertLevel;
}

/** Returned when a CME is too slow (or has no speed) to be treated as Earth-directed. */
export interface CmeNotEarthDirected {
  arrival_time: null;
  impact_probability: 0;
  message: string;
}

export interface CmeArrivalEstimate {
  detection_time: string;
  cme_speed: string;
  estimated_arrival: string | null;
  arrival_window: string;
  arrival_window_hours: { earliest: number; latest: number };
  arrival_window_utc: { earliest: string; latest: string } | null;
  impact_probability: number;
  severity: 'moderate' | 'high';
  warnings: string[];
}

export type CmeArrivalPrediction = CmeNotEarthDirected | CmeArrivalEstimate;

export interface OverallRiskAssessment {
  risk_level: OverallRiskLevel;
  risk_score: number;
  color: RiskColor;
  message: string;
  primary_concerns: string[];
}

export interface DataQualityAssessment {
  score: number;
  rating: 'Excellent' | 'Good' | 'Fair' | 'Limited';
  data_points: {
    flares: number;
    solar_wind: number;
    xray_flux: number;
  };
}

export interface ComprehensivePredictions {
  status: 'success';
  generated_at: string;
  predictions: {
    solar_flares: FlarePrediction;
    geomagnetic_storm: GeomagneticStormPrediction;
    radiation_storm: RadiationStormPrediction;
    cme_arrival: CmeArrivalPrediction | null;
    cme_incoming: boolean;
  };
  overall_risk_assessment: OverallRiskAssessment;
  data_quality: DataQualityAssessment;
  ai_insights?: string;
}

// ============================================================================
// Alerts
// ============================================================================

export type AlertType = 'solar_flare' | 'cme' | 'geomagnetic_storm' | 'radiation';

export interface Alert {
  id: string | null;
  type: AlertType;
  severity: SeverityTier;
  title: string;
  description: string;
  timestamp: string | null;
  source: string;
}

export interface AlertSummary {
  total: number;
  extreme: number;
  high: number;
  moderate: number;
  low: number;
}

// ============================================================================
// Chat
// ============================================================================

export interface ChatMessage {
  role: string;
  content: string;
}

export interface ChatResponse {
  response: string;
  sources: string[];
}
