type ReadinessReason = string | null;

let archiveReady = false;
let archiveReason: ReadinessReason = 'init';
let mqttReady = false;
let mqttReason: ReadinessReason = 'disabled';

export function setArchiveReady(ready: boolean, reason: ReadinessReason = null) {
  archiveReady = ready;
  archiveReason = ready ? null : reason;
}

export function setMqttReady(ready: boolean, reason: ReadinessReason = null) {
  mqttReady = ready;
  mqttReason = ready ? null : reason;
}

export function getReadiness() {
  return {
    archiveReady,
    archiveReason,
    mqttReady,
    mqttReason,
  };
}
