import type { HealthStatus } from './contracts/send';

export const SERVICE_NAME = 'message-dispatch';

const HEALTH_STATUS: Readonly<HealthStatus> = Object.freeze({ status: 'ok' });

export function checkHealth(): HealthStatus {
  return { ...HEALTH_STATUS };
}
