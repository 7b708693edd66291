export interface EnvironmentConfig {
  // All optional
  LOG_LEVEL?: string;
  SNAPKEEP_POLICY?: string;
  SNAPKEEP_PARSE?: string;
}
