/**
 * Readiness flag — set by index.ts once the scheduler and REST server are up,
 * cleared at shutdown. Read by the /healthz/ready probe.
 */

let _ready = false;

export function isReady(): boolean {
  return _ready;
}

export function setReady(value: boolean): void {
  _ready = value;
}
