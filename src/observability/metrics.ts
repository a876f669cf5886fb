import config from '../config';
import { getReadiness } from '../state/readiness';
import { getRunState } from '../state/runMonitor';

type GaugeMetricName =
  | 'windpark_archive_up'
  | 'windpark_mqtt_up'
  | 'windpark_run_ok'
  | 'windpark_sim_time_seconds'
  | 'windpark_registered_agents'
  | 'windpark_feedin_kw'
  | 'windpark_feedin_ceiling_kw'
  | 'windpark_curtailment_factor'
  | 'windpark_capped_entities';

type CounterMetricName =
  | 'windpark_steps_total'
  | 'windpark_controller_activations_total'
  | 'windpark_relay_errors_total'
  | 'windpark_archive_rows_total'
  | 'windpark_archive_write_errors_total'
  | 'windpark_cap_publish_total'
  | 'windpark_run_errors_total';

type HistogramMetricName =
  | 'windpark_step_duration_seconds'
  | 'windpark_controller_cycle_duration_seconds'
  | 'windpark_entity_power_kw'
  | 'windpark_cap_publish_latency_ms';

type MetricName = GaugeMetricName | CounterMetricName | HistogramMetricName;

type MetricDef = { help: string; type: 'gauge' | 'counter' | 'histogram' };
const metricDefs: Record<MetricName, MetricDef> = {
  windpark_archive_up: { help: 'Archive store ready (1=ready,0=not ready)', type: 'gauge' },
  windpark_mqtt_up: { help: 'MQTT connectivity (1=connected,0=down or disabled)', type: 'gauge' },
  windpark_run_ok: { help: 'Scenario run healthy (1=idle/running/done,0=failed)', type: 'gauge' },
  windpark_sim_time_seconds: { help: 'Simulation time of the last completed step', type: 'gauge' },
  windpark_registered_agents: { help: 'WECS agents registered with the controller', type: 'gauge' },
  windpark_feedin_kw: { help: 'Aggregate wind park feed-in seen by the controller (kW)', type: 'gauge' },
  windpark_feedin_ceiling_kw: { help: 'Configured wind park feed-in ceiling (kW)', type: 'gauge' },
  windpark_curtailment_factor: {
    help: 'Scale factor of the last curtailment (1 when uncapped)',
    type: 'gauge',
  },
  windpark_capped_entities: { help: 'Entities running with a power cap', type: 'gauge' },
  windpark_steps_total: { help: 'Completed lockstep steps', type: 'counter' },
  windpark_controller_activations_total: {
    help: 'Controller activations grouped by action (hold|release|curtail)',
    type: 'counter',
  },
  windpark_relay_errors_total: {
    help: 'Relay errors grouped by stage (inputs|reports|caps|timeout)',
    type: 'counter',
  },
  windpark_archive_rows_total: { help: 'Archive records written', type: 'counter' },
  windpark_archive_write_errors_total: { help: 'Failed archive batch writes', type: 'counter' },
  windpark_cap_publish_total: {
    help: 'MQTT power cap publishes grouped by result',
    type: 'counter',
  },
  windpark_run_errors_total: { help: 'Fatal run errors grouped by error name', type: 'counter' },
  windpark_step_duration_seconds: {
    help: 'Wall-clock duration of one lockstep step (seconds)',
    type: 'histogram',
  },
  windpark_controller_cycle_duration_seconds: {
    help: 'Wall-clock duration of one controller activation (seconds)',
    type: 'histogram',
  },
  windpark_entity_power_kw: {
    help: 'Active power per entity and step (kW)',
    type: 'histogram',
  },
  windpark_cap_publish_latency_ms: {
    help: 'Latency of MQTT power cap publishes (ms)',
    type: 'histogram',
  },
};

const gaugeValues: Record<GaugeMetricName, number> = {
  windpark_archive_up: 0,
  windpark_mqtt_up: 0,
  windpark_run_ok: 0,
  windpark_sim_time_seconds: 0,
  windpark_registered_agents: 0,
  windpark_feedin_kw: 0,
  windpark_feedin_ceiling_kw: 0,
  windpark_curtailment_factor: 1,
  windpark_capped_entities: 0,
};

const labeledCounters: Record<CounterMetricName, Map<string, number>> = {
  windpark_steps_total: new Map(),
  windpark_controller_activations_total: new Map(),
  windpark_relay_errors_total: new Map(),
  windpark_archive_rows_total: new Map(),
  windpark_archive_write_errors_total: new Map(),
  windpark_cap_publish_total: new Map(),
  windpark_run_errors_total: new Map(),
};

const histogramBucketsMs = [5, 10, 25, 50, 100, 250, 500, 1000, 2000];
const histogramBucketsSeconds = [0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 5];
const histogramBucketsKw = [10, 50, 100, 250, 500, 1000, 2000, 5000];

type HistogramStore = { buckets: number[]; counts: number[]; sum: number; count: number };

const histograms: Record<HistogramMetricName, { buckets: number[]; data: Map<string, HistogramStore> }> = {
  windpark_step_duration_seconds: { buckets: histogramBucketsSeconds, data: new Map() },
  windpark_controller_cycle_duration_seconds: { buckets: histogramBucketsSeconds, data: new Map() },
  windpark_entity_power_kw: { buckets: histogramBucketsKw, data: new Map() },
  windpark_cap_publish_latency_ms: { buckets: histogramBucketsMs, data: new Map() },
};

function isGauge(name: MetricName): name is GaugeMetricName {
  return name in gaugeValues;
}

function isCounter(name: MetricName): name is CounterMetricName {
  return name in labeledCounters;
}

export function collectHealthMetrics(): void {
  const readiness = getReadiness();
  gaugeValues.windpark_archive_up = readiness.archiveReady ? 1 : 0;
  gaugeValues.windpark_mqtt_up = readiness.mqttReady ? 1 : 0;
  gaugeValues.windpark_run_ok = getRunState().status === 'failed' ? 0 : 1;
}

function renderLabeledCounters(name: CounterMetricName): string[] {
  const lines: string[] = [];
  labeledCounters[name].forEach((value, labelKey) => {
    lines.push(`${name}${labelKey} ${value}`);
  });
  if (lines.length === 0) {
    lines.push(`${name} 0`);
  }
  return lines;
}

function renderHistograms(name: HistogramMetricName): string[] {
  const lines: string[] = [];
  const hist = histograms[name];
  hist.data.forEach((store, labelKey) => {
    // counts are stored cumulative
    store.buckets.forEach((bucket, idx) => {
      const labels = labelKey ? `${labelKey.slice(0, -1)},le="${bucket}"}` : `{le="${bucket}"}`;
      lines.push(`${name}_bucket${labels} ${store.counts[idx]}`);
    });
    const labels = labelKey ? `${labelKey.slice(0, -1)},le="+Inf"}` : '{le="+Inf"}';
    lines.push(`${name}_bucket${labels} ${store.count}`);
    lines.push(`${name}_sum${labelKey} ${store.sum}`);
    lines.push(`${name}_count${labelKey} ${store.count}`);
  });
  if (hist.data.size === 0) {
    hist.buckets.forEach((bucket) => {
      lines.push(`${name}_bucket{le="${bucket}"} 0`);
    });
    lines.push(`${name}_bucket{le="+Inf"} 0`);
    lines.push(`${name}_sum 0`);
    lines.push(`${name}_count 0`);
  }
  return lines;
}

export function shouldExposePrometheus(): boolean {
  return config.observability.prometheusEnabled;
}

export function prometheusPath(): string {
  return config.observability.prometheusPath;
}

export function metricsContentType(): string {
  return 'text/plain; version=0.0.4';
}

export function renderPrometheus(): string {
  const lines: string[] = [];
  (Object.keys(metricDefs) as MetricName[]).forEach((name) => {
    const def = metricDefs[name];
    lines.push(`# HELP ${name} ${def.help}`);
    lines.push(`# TYPE ${name} ${def.type}`);
    if (isGauge(name)) {
      lines.push(`${name} ${gaugeValues[name]}`);
    } else if (isCounter(name)) {
      lines.push(...renderLabeledCounters(name));
    } else {
      lines.push(...renderHistograms(name));
    }
  });
  return lines.join('\n') + '\n';
}

function labelsToKey(labels: Record<string, string | number>): string {
  const parts = Object.keys(labels)
    .sort()
    .map((k) => `${k}="${labels[k]}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

export function setGaugeValue(name: GaugeMetricName, value: number): void {
  gaugeValues[name] = value;
}

export function incrementCounter(
  name: CounterMetricName,
  labels: Record<string, string | number> = {},
  amount = 1,
): void {
  const key = labelsToKey(labels);
  const current = labeledCounters[name].get(key) ?? 0;
  labeledCounters[name].set(key, current + amount);
}

export function getCounterValue(
  name: CounterMetricName,
  labels: Record<string, string | number> = {},
): number {
  return labeledCounters[name].get(labelsToKey(labels)) ?? 0;
}

export function observeHistogram(
  name: HistogramMetricName,
  value: number,
  labels: Record<string, string | number> = {},
): void {
  const hist = histograms[name];
  const key = labelsToKey(labels);
  const store = hist.data.get(key) ?? {
    buckets: [...hist.buckets],
    counts: hist.buckets.map(() => 0),
    sum: 0,
    count: 0,
  };
  hist.data.set(key, store);

  store.count += 1;
  store.sum += value;
  store.buckets.forEach((bucket, idx) => {
    if (value <= bucket) {
      store.counts[idx] += 1;
    }
  });
}

export function resetMetricsForTest(): void {
  (Object.keys(gaugeValues) as GaugeMetricName[]).forEach((name) => {
    gaugeValues[name] = name === 'windpark_curtailment_factor' ? 1 : 0;
  });

  (Object.keys(labeledCounters) as CounterMetricName[]).forEach((name) =>
    labeledCounters[name].clear(),
  );

  (Object.keys(histograms) as HistogramMetricName[]).forEach((name) => {
    histograms[name].data.clear();
  });
}
