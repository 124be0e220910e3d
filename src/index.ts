import { Ecos } from './ecos-api';
import type { EcosClientOptions } from './interfaces/ecos-interfaces';
import { readConfig } from './interfaces/config';
import { logger } from './logging';

export { DATACENTERS, Ecos, decodeResponse } from './ecos-api';
export * from './errors';
export type {
    Datacenter,
    EcosClientOptions,
    HttpMethod,
    HttpRequest,
    HttpResponse,
    HttpTransport,
    QueryParams,
} from './interfaces/ecos-interfaces';
export { readConfig } from './interfaces/config';
export type { default as IConfig, IConfigEcos } from './interfaces/config';
export { logger } from './logging';
export { HISTORY_PERIOD, INSIGHT_PERIOD, SHARED_DEVICES_HOME_NAME } from './model';
export type {
    BatteryStatus,
    DayEnergy,
    Device,
    DeviceInsight,
    EnergyConsumptionMetrics,
    EnergyHistory,
    EnergyMetric,
    EnergyStatistics,
    Home,
    HomePowerMetrics,
    PowerMetrics,
    PowerTimeSeries,
    User,
    WeeklyEnergy,
} from './model';
export { AxiosTransport, FetchTransport } from './transport';

/**
 * Build a client from the `ECOS_*` environment variables (and `.env`).
 * `overrides` take precedence over the environment. Without a `logger`
 * override, `LOG_LEVEL` is applied to the package logger.
 */
export function createClientFromEnv(overrides: Partial<EcosClientOptions> = {}): Ecos {
    const { ecos, logLevel } = readConfig();
    if (overrides.logger === undefined) {
        logger.level = logLevel;
    }

    return new Ecos({
        datacenter: ecos.datacenter,
        url: ecos.url,
        email: ecos.email,
        password: ecos.password,
        accessToken: ecos.accessToken,
        refreshToken: ecos.refreshToken,
        timeout: ecos.timeout,
        ...overrides,
    });
}
