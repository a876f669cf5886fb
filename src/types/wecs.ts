export interface WecsParams {
  pRatedKw: number;
  vRated: number;
  vMin: number;
  // Storm cut-out; no cut-out when absent.
  vMax?: number;
}

export interface WecsGroupConfig {
  count: number;
  params: WecsParams;
}

export interface ControllerConfig {
  maxWindparkFeedinKw: number;
  checkIntervalSeconds: number;
}

export interface ScenarioConfig {
  startDate: string;
  durationSeconds: number;
  stepSizeSeconds: number;
  recordIntervalSeconds: number;
  windFile: string;
  wecs: WecsGroupConfig[];
  controller: ControllerConfig;
}

/** `null` means the entity runs uncapped. */
export type PowerCap = number | null;

export interface ArchiveRecord {
  runId: string;
  seq: number;
  time: number;
  timestamp: string;
  entityId: string;
  windSpeed: number;
  activePowerKw: number;
  powerCapKw: PowerCap;
}
