import type { HealthService } from "../../application/services/health.service.js";

/**
 * Health handler with two modes:
 * - Deep check: database round-trip + component status (for /readiness)
 * - Shallow check: pre-serialized instant response (for /health and liveness probes)
 */
export const healthHandler = (healthService: HealthService) => {
  const shallowHeaders = { "Content-Type": "application/json; charset=utf-8" };

  const deepCheck = async (): Promise<Response> => {
    const status = await healthService.check();
    const httpCode = status.status === "down" ? 503 : 200;
    return Response.json({ data: status }, { status: httpCode });
  };

  const shallowCheck = (): Response => {
    const body = `{"data":{"status":"ok","uptime":${process.uptime()}}}`;
    return new Response(body, { status: 200, headers: shallowHeaders });
  };

  return { deepCheck, shallowCheck };
};
