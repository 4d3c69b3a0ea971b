/**
 * Wire shapes for the inference endpoints. Field names are snake_case because
 * they are serialized as-is into JSON responses.
 */
import { ValidationIssue } from './enums'

export interface FlightRecord {
  flight_id: string;
  distance: number;
  bad_weather: boolean;
}

export interface PredictionResult {
  flight_id: string;
  delay_probability: number;
  delayed: boolean;
}

export interface DroppedItem {
  index: number;
  issues: ValidationIssue[];
}

export interface BatchResult {
  predictions: PredictionResult[];
  count: number;
  // present only when the caller asked for batch diagnostics
  dropped?: DroppedItem[];
}

export interface MetricsSnapshot {
  total_predictions: number;
  uptime_seconds: number;
}

export interface ErrorSimulationRequest {
  raise_error: boolean;
}

export interface SimulationAck {
  status: 'ok';
  message: string;
}

export interface ServiceInfo {
  service: string;
  description: string;
  version: string;
  features: string[];
}

export type PredictionMode = 'single' | 'batch';
