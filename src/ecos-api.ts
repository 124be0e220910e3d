import { format } from 'date-fns';
import type { Logger } from 'pino';
import {
    ApiResponseError,
    AuthenticationError,
    ECOS_ERROR_CODE,
    EcosApiError,
    HomeDoesNotExistError,
    InitializationError,
    InvalidJsonError,
    InvalidResponseError,
    ParameterVerificationFailedError,
    UnauthorizedDeviceError,
    httpErrorFor,
} from './errors';
import type {
    Datacenter,
    EcosClientOptions,
    HttpMethod,
    HttpResponse,
    HttpTransport,
    QueryParams,
} from './interfaces/ecos-interfaces';
import { logger as defaultLogger } from './logging';
import {
    parsePayload,
    toDeviceInsight,
    toEnergyHistory,
    toHomePowerMetrics,
    toPowerMetrics,
    toPowerTimeSeries,
    toWeeklyEnergy,
} from './mapping';
import {
    DeviceSchema,
    HomeSchema,
    LoginDataSchema,
    RawDeviceRunDataSchema,
    RawHistorySchema,
    RawHomeRunDataSchema,
    RawInsightSchema,
    RawPowerSeriesSchema,
    RawWeeklyEnergySchema,
    UserSchema,
} from './model';
import type {
    Device,
    DeviceInsight,
    EnergyHistory,
    HISTORY_PERIOD,
    Home,
    HomePowerMetrics,
    INSIGHT_PERIOD,
    PowerMetrics,
    PowerTimeSeries,
    User,
    WeeklyEnergy,
} from './model';
import { AxiosTransport } from './transport';
import { isRecord, joinUrl, toUnixMillis, toUnixSeconds, tryParseJson } from './utils';

export const DATACENTERS: Record<Datacenter, string> = {
    CN: 'https://api-ecos-hu.weiheng-tech.com',
    EU: 'https://api-ecos-eu.weiheng-tech.com',
    AU: 'https://api-ecos-au.weiheng-tech.com',
};

function isDatacenter(value: string): value is Datacenter {
    return Object.hasOwn(DATACENTERS, value);
}

function errorMessage(body: unknown): string | undefined {
    if (!isRecord(body)) return undefined;
    if (typeof body.message === 'string' && body.message !== '') return body.message;
    if (typeof body.error === 'string' && body.error !== '') return body.error;
    return undefined;
}

/**
 * Turn an HTTP answer into the `data` of the ECOS envelope, or throw the
 * error matching the HTTP status or the vendor code.
 */
export function decodeResponse(response: HttpResponse): unknown {
    const body = tryParseJson(response.body);

    if (response.status < 200 || response.status >= 300) {
        throw httpErrorFor(response.status, errorMessage(body) ?? response.statusText);
    }
    if (body === undefined) {
        throw new InvalidJsonError();
    }
    if (!isRecord(body)) {
        throw new InvalidResponseError('Unexpected response envelope');
    }
    if (body.success !== true) {
        const code = typeof body.code === 'number' ? body.code : -1;
        const message = typeof body.message === 'string' ? body.message : '';
        throw new ApiResponseError(code, message);
    }
    return body.data;
}

/**
 * Re-throw an {@link ApiResponseError} as the error registered for its
 * vendor code. Other errors pass through.
 */
function translateApiError(err: unknown, mapping: Partial<Record<number, () => EcosApiError>>): never {
    if (err instanceof ApiResponseError) {
        const build = mapping[err.code];
        if (build) {
            throw build();
        }
    }
    throw err;
}

/**
 * Client of the ECOS cloud API.
 *
 * Every data method logs in first when no access token is held, using the
 * credentials given to the constructor or to {@link Ecos.login}.
 */
export class Ecos {
    public readonly url: string;
    public accessToken: string | null;
    public refreshToken: string | null;

    private email: string | undefined;
    private password: string | undefined;
    private readonly transport: HttpTransport;
    private readonly log: Logger;

    constructor(options: EcosClientOptions) {
        this.log = options.logger ?? defaultLogger;

        if (options.url !== undefined) {
            this.url = options.url.replace(/\/+$/, '');
        } else if (options.datacenter === undefined) {
            throw new InitializationError('url or datacenter not specified');
        } else if (isDatacenter(options.datacenter)) {
            this.url = DATACENTERS[options.datacenter];
        } else {
            throw new InitializationError(`datacenter must be one of ${Object.keys(DATACENTERS).join(', ')}`);
        }

        this.email = options.email;
        this.password = options.password;
        this.accessToken = options.accessToken ?? null;
        this.refreshToken = options.refreshToken ?? null;
        this.transport = options.transport ?? new AxiosTransport({ timeout: options.timeout });

        this.log.debug({ url: this.url }, 'ECOS :: session initialized');
    }

    get isAuthenticated(): boolean {
        return this.accessToken !== null;
    }

    private async call(
        method: HttpMethod,
        apiPath: string,
        options: { params?: QueryParams; body?: Record<string, unknown>; authenticated?: boolean } = {}
    ): Promise<unknown> {
        const url = joinUrl(this.url, apiPath);
        const headers: Record<string, string> = { Accept: 'application/json' };
        if (options.authenticated !== false && this.accessToken !== null) {
            headers.Authorization = this.accessToken;
        }
        if (method === 'POST') {
            headers['Content-Type'] = 'application/json';
        }

        this.log.debug({ method, url }, 'ECOS :: API call');

        let response: HttpResponse;
        try {
            response = await this.transport.request({
                method,
                url,
                headers,
                params: options.params,
                body: method === 'POST' ? options.body ?? {} : undefined,
            });
        } catch (err) {
            throw new EcosApiError(`Request failed: ${method} ${url}`, { cause: err });
        }

        return decodeResponse(response);
    }

    private get(apiPath: string, params?: QueryParams): Promise<unknown> {
        return this.call('GET', apiPath, { params });
    }

    private post(apiPath: string, payload: Record<string, unknown> = {}): Promise<unknown> {
        return this.call('POST', apiPath, { body: payload });
    }

    /**
     * Authenticate with an email and password. Given credentials replace the
     * stored ones.
     *
     * @throws AuthenticationError when the credentials are missing or rejected.
     */
    async login(email?: string, password?: string): Promise<void> {
        this.log.info('ECOS :: Login');
        if (email !== undefined) this.email = email;
        if (password !== undefined) this.password = password;

        if (!this.email || !this.password) {
            throw new AuthenticationError('email and password are required to login');
        }

        const payload = {
            _t: toUnixSeconds(new Date()),
            clientType: 'BROWSER',
            clientVersion: '1.0',
            email: this.email,
            password: this.password,
        };

        let data: unknown;
        try {
            data = await this.call('POST', '/api/client/guide/login', { body: payload, authenticated: false });
        } catch (err) {
            translateApiError(err, {
                [ECOS_ERROR_CODE.ACCOUNT_OR_PASSWORD_ERROR]: () =>
                    new AuthenticationError(undefined, { cause: err }),
            });
        }

        const tokens = parsePayload(LoginDataSchema, data, 'login');
        this.accessToken = tokens.accessToken;
        this.refreshToken = tokens.refreshToken;
    }

    logout(): void {
        this.log.info('ECOS :: Logout');
        this.accessToken = null;
        this.refreshToken = null;
    }

    private async ensureLogin(): Promise<void> {
        if (this.accessToken === null) {
            await this.login();
        }
    }

    private async homeCall(homeId: string, request: () => Promise<unknown>): Promise<unknown> {
        try {
            return await request();
        } catch (err) {
            translateApiError(err, {
                [ECOS_ERROR_CODE.HOME_DOES_NOT_EXIST]: () => new HomeDoesNotExistError(homeId, { cause: err }),
            });
        }
    }

    private async deviceCall(deviceId: string, request: () => Promise<unknown>): Promise<unknown> {
        try {
            return await request();
        } catch (err) {
            translateApiError(err, {
                [ECOS_ERROR_CODE.UNAUTHORIZED_DEVICE]: () => new UnauthorizedDeviceError(deviceId, { cause: err }),
                [ECOS_ERROR_CODE.PARAMETER_VERIFICATION_FAILED]: () =>
                    new ParameterVerificationFailedError(undefined, { cause: err }),
            });
        }
    }

    async getUser(): Promise<User> {
        this.log.info('ECOS :: Get user');
        await this.ensureLogin();
        return parsePayload(UserSchema, await this.get('/api/client/settings/user/info'), 'user');
    }

    async getHomes(): Promise<Home[]> {
        this.log.info('ECOS :: Get home list');
        await this.ensureLogin();
        return parsePayload(HomeSchema.array(), await this.get('/api/client/v2/home/family/query'), 'home list');
    }

    /**
     * @throws HomeDoesNotExistError when the home is unknown.
     */
    async getDevices(homeId: string): Promise<Device[]> {
        this.log.info({ homeId }, 'ECOS :: Get devices for home');
        await this.ensureLogin();
        const data = await this.homeCall(homeId, () => this.get('/api/client/v2/home/device/query', { homeId }));
        return parsePayload(DeviceSchema.array(), data, 'device list');
    }

    async getAllDevices(): Promise<Device[]> {
        this.log.info('ECOS :: Get devices for every home');
        await this.ensureLogin();
        return parsePayload(DeviceSchema.array(), await this.get('/api/client/home/device/list'), 'device list');
    }

    /**
     * Power measurements of the current day until now, one point every five
     * minutes.
     *
     * @throws UnauthorizedDeviceError when the device is unknown or not shared with the user.
     */
    async getTodayDeviceData(deviceId: string): Promise<PowerTimeSeries> {
        this.log.info({ deviceId }, 'ECOS :: Get current day data for device');
        await this.ensureLogin();
        const data = await this.deviceCall(deviceId, () =>
            this.post('/api/client/home/now/device/realtime', { deviceId })
        );
        return toPowerTimeSeries(parsePayload(RawPowerSeriesSchema, data, 'device power series'));
    }

    /**
     * @throws UnauthorizedDeviceError when the device is unknown or not shared with the user.
     */
    async getRealtimeDeviceData(deviceId: string): Promise<PowerMetrics> {
        this.log.info({ deviceId }, 'ECOS :: Get realtime data for device');
        await this.ensureLogin();
        const data = await this.deviceCall(deviceId, () =>
            this.post('/api/client/home/now/device/runData', { deviceId })
        );
        return toPowerMetrics(parsePayload(RawDeviceRunDataSchema, data, 'device run data'));
    }

    /**
     * @throws HomeDoesNotExistError when the home is unknown.
     */
    async getRealtimeHomeData(homeId: string): Promise<HomePowerMetrics> {
        this.log.info({ homeId }, 'ECOS :: Get realtime data for home');
        await this.ensureLogin();
        const data = await this.homeCall(homeId, () => this.get('/api/client/v2/home/device/runData', { homeId }));
        return toHomePowerMetrics(parsePayload(RawHomeRunDataSchema, data, 'home run data'));
    }

    /**
     * Aggregated energy for a period. See {@link HISTORY_PERIOD} for the
     * accepted `periodType` values.
     *
     * @throws UnauthorizedDeviceError when the device is unknown or not shared with the user.
     * @throws ParameterVerificationFailedError when the period type is rejected.
     */
    async getHistory(deviceId: string, startDate: Date, periodType: HISTORY_PERIOD): Promise<EnergyHistory> {
        this.log.info(
            { deviceId, startDate: format(startDate, 'yyyy-MM-dd HH:mm'), periodType },
            'ECOS :: Get history for device'
        );
        await this.ensureLogin();
        const data = await this.deviceCall(deviceId, () =>
            this.post('/api/client/home/history/home', {
                deviceId,
                timestamp: toUnixSeconds(startDate),
                periodType,
            })
        );
        return toEnergyHistory(parsePayload(RawHistorySchema, data, 'history'));
    }

    /**
     * Energy metrics and statistics of a device for a period. See
     * {@link INSIGHT_PERIOD} for the accepted `periodType` values.
     *
     * @throws UnauthorizedDeviceError when the device is unknown or not shared with the user.
     * @throws ParameterVerificationFailedError when the period type is rejected.
     */
    async getInsight(deviceId: string, startDate: Date, periodType: INSIGHT_PERIOD): Promise<DeviceInsight> {
        this.log.info(
            { deviceId, startDate: format(startDate, 'yyyy-MM-dd HH:mm'), periodType },
            'ECOS :: Get insight for device'
        );
        await this.ensureLogin();
        // this endpoint takes milliseconds
        const data = await this.deviceCall(deviceId, () =>
            this.post('/api/client/v2/device/three/device/insight', {
                deviceId,
                timestamp: toUnixMillis(startDate),
                periodType,
            })
        );
        return toDeviceInsight(parsePayload(RawInsightSchema, data, 'insight'));
    }

    /**
     * Daily energy of the last seven days of a home.
     *
     * @throws HomeDoesNotExistError when the home is unknown.
     */
    async getHomeEnergy(homeId: string): Promise<WeeklyEnergy> {
        this.log.info({ homeId }, 'ECOS :: Get weekly energy for home');
        await this.ensureLogin();
        const data = await this.homeCall(homeId, () => this.get('/api/client/v2/home/device/energy', { homeId }));
        return toWeeklyEnergy(parsePayload(RawWeeklyEnergySchema, data, 'home energy'));
    }

    /**
     * Ask the devices of a home to push fresh data to the cloud.
     *
     * @throws HomeDoesNotExistError when the home is unknown.
     */
    async refreshHome(homeId: string): Promise<void> {
        this.log.info({ homeId }, 'ECOS :: Refresh home');
        await this.ensureLogin();
        await this.homeCall(homeId, () => this.post('/api/client/v2/home/device/incrRefresh', { homeId }));
    }
}
