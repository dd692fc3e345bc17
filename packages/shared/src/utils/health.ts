/**
 * Health Check Handlers
 *
 * /healthz (liveness) and /health (dependency detail).
 * Framework-agnostic: handlers return a status code and a body.
 */

export interface HealthCheck {
    name: string;
    check: () => Promise<boolean>;
}

export interface HealthCheckResult {
    name: string;
    status: 'pass' | 'fail';
    latency_ms: number;
}

export interface HealthStatus {
    status: 'healthy' | 'degraded' | 'unhealthy';
    version: string;
    uptime: number;
    checks?: HealthCheckResult[];
    timestamp: string;
}

export interface HealthResponse {
    status: 200 | 503;
    body: HealthStatus;
}

async function runCheck({ name, check }: HealthCheck): Promise<HealthCheckResult> {
    const checkStart = performance.now();
    let passed = false;
    try {
        passed = await check();
    } catch {
        // a throwing check counts as a failure
        passed = false;
    }
    return {
        name,
        status: passed ? 'pass' : 'fail',
        latency_ms: Math.round(performance.now() - checkStart),
    };
}

export function createHealthChecks(
    version: string,
    checks: HealthCheck[] = []
) {
    const startTime = Date.now();
    const uptime = () => (Date.now() - startTime) / 1000;

    return {
        /**
         * Liveness check: 200 while the process runs, whatever its dependencies
         */
        async healthz(): Promise<HealthResponse> {
            return {
                status: 200,
                body: {
                    status: 'healthy',
                    version,
                    uptime: uptime(),
                    timestamp: new Date().toISOString(),
                },
            };
        },

        /**
         * Detailed status. Optional dependencies failing degrade the
         * service; it is unhealthy only when every check fails.
         */
        async health(): Promise<HealthResponse> {
            const results = await Promise.all(checks.map(runCheck));
            const failCount = results.filter((r) => r.status === 'fail').length;

            let status: HealthStatus['status'] = 'healthy';
            if (failCount > 0) {
                status = failCount === results.length ? 'unhealthy' : 'degraded';
            }

            return {
                status: status === 'unhealthy' ? 503 : 200,
                body: {
                    status,
                    version,
                    uptime: uptime(),
                    checks: results,
                    timestamp: new Date().toISOString(),
                },
            };
        },
    };
}

export type HealthChecks = ReturnType<typeof createHealthChecks>;
