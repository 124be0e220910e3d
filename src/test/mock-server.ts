import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { isRecord } from '../utils';
import {
    DEVICE_ID,
    HOME_ID,
    TEST_ACCESS_TOKEN,
    TEST_LOGIN,
    TEST_PASSWORD,
    TEST_REFRESH_TOKEN,
    deviceRunData,
    devicesData,
    historyData,
    homeRunData,
    homesData,
    insightData,
    powerSeriesData,
    userData,
    weeklyEnergyData,
} from './fixtures';

export interface RecordedRequest {
    method: string;
    path: string;
    query: Record<string, unknown>;
    body: unknown;
    authorization: string | undefined;
}

const HISTORY_PERIODS = [0, 1, 2, 3, 4];
const INSIGHT_PERIODS = [0, 2, 4, 5];

function success(res: Response, data?: unknown): void {
    res.status(200).json({ code: 0, message: 'success', success: true, data });
}

function failure(res: Response, code: number, message: string): void {
    res.status(200).json({ code, message, success: false });
}

function springError(req: Request, res: Response, status: number, error: string): void {
    res.status(status).json({
        timestamp: Date.now(),
        status,
        error,
        message: '',
        path: req.path.replace(/^\/api\/client/, ''),
    });
}

function field(req: Request, name: string): unknown {
    const body: unknown = req.body;
    return isRecord(body) ? body[name] : undefined;
}

/**
 * In-process stand-in for the ECOS API, listening on an ephemeral port of
 * the loopback interface.
 */
export class EcosMockServer {
    public readonly requests: RecordedRequest[] = [];
    private server: Server | null = null;
    private baseUrl: string | null = null;

    constructor(
        private readonly login: string = TEST_LOGIN,
        private readonly password: string = TEST_PASSWORD,
        public readonly accessToken: string = TEST_ACCESS_TOKEN,
        public readonly refreshToken: string = TEST_REFRESH_TOKEN
    ) {}

    get url(): string {
        if (this.baseUrl === null) {
            throw new Error('mock server is not started');
        }
        return this.baseUrl;
    }

    async start(): Promise<string> {
        const app = this.createApp();
        const server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address: AddressInfo | string | null = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('mock server has no TCP address');
        }
        this.server = server;
        this.baseUrl = `http://127.0.0.1:${address.port}`;
        return this.baseUrl;
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (server === null) return;
        this.server = null;
        this.baseUrl = null;
        await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }

    private createApp(): express.Express {
        const app = express();
        app.use(express.json());

        app.use((req: Request, _res: Response, next: NextFunction) => {
            this.requests.push({
                method: req.method,
                path: req.path,
                query: { ...req.query },
                body: req.body,
                authorization: req.get('Authorization'),
            });
            next();
        });

        app.use((req: Request, res: Response, next: NextFunction) => {
            if (req.method === 'POST' && !req.is('application/json')) {
                springError(req, res, 415, 'Unsupported Media Type');
                return;
            }
            next();
        });

        app.post('/api/client/guide/login', (req, res) => this.handleLogin(req, res));

        const authenticated = (req: Request, res: Response, next: NextFunction): void => {
            if (req.get('Authorization') !== this.accessToken) {
                res.status(401).json({ code: 401, message: 'Unauthorized', success: false });
                return;
            }
            next();
        };

        const knownHome = (homeId: unknown): boolean => homeId === HOME_ID;
        const knownDevice = (deviceId: unknown): boolean => deviceId === DEVICE_ID;

        app.get('/api/client/settings/user/info', authenticated, (_req, res) => success(res, userData));

        app.get('/api/client/v2/home/family/query', authenticated, (_req, res) => success(res, homesData));

        app.get('/api/client/v2/home/device/query', authenticated, (req, res) => {
            if (!knownHome(req.query.homeId)) return failure(res, 20450, 'Home does not exist');
            success(res, devicesData);
        });

        app.get('/api/client/home/device/list', authenticated, (_req, res) => success(res, devicesData));

        app.post('/api/client/home/now/device/realtime', authenticated, (req, res) => {
            if (!knownDevice(field(req, 'deviceId'))) return failure(res, 20424, 'Unauthorized device');
            success(res, powerSeriesData);
        });

        app.post('/api/client/home/now/device/runData', authenticated, (req, res) => {
            if (!knownDevice(field(req, 'deviceId'))) return failure(res, 20424, 'Unauthorized device');
            success(res, deviceRunData);
        });

        app.get('/api/client/v2/home/device/runData', authenticated, (req, res) => {
            if (!knownHome(req.query.homeId)) return failure(res, 20450, 'Home does not exist');
            success(res, homeRunData);
        });

        app.post('/api/client/home/history/home', authenticated, (req, res) => {
            if (!knownDevice(field(req, 'deviceId'))) return failure(res, 20424, 'Unauthorized device');
            if (!HISTORY_PERIODS.includes(Number(field(req, 'periodType')))) {
                return failure(res, 20404, 'Parameter verification failed');
            }
            success(res, historyData);
        });

        app.post('/api/client/v2/device/three/device/insight', authenticated, (req, res) => {
            if (!knownDevice(field(req, 'deviceId'))) return failure(res, 20424, 'Unauthorized device');
            if (!INSIGHT_PERIODS.includes(Number(field(req, 'periodType')))) {
                return failure(res, 20404, 'Parameter verification failed');
            }
            success(res, insightData);
        });

        app.get('/api/client/v2/home/device/energy', authenticated, (req, res) => {
            if (!knownHome(req.query.homeId)) return failure(res, 20450, 'Home does not exist');
            success(res, weeklyEnergyData);
        });

        app.post('/api/client/v2/home/device/incrRefresh', authenticated, (req, res) => {
            if (!knownHome(field(req, 'homeId'))) return failure(res, 20450, 'Home does not exist');
            success(res);
        });

        app.get('/api/client/broken', (_req, res) => {
            res.status(200).type('text/html').send('<html>maintenance</html>');
        });

        app.all('/api/client/guide/login', (req, res) => springError(req, res, 405, 'Method Not Allowed'));

        app.all('*', (req, res) => {
            if (req.path.startsWith('/api/client/')) {
                springError(req, res, 404, 'Not Found');
                return;
            }
            res.status(502).send('Bad Gateway');
        });

        return app;
    }

    private handleLogin(req: Request, res: Response): void {
        const email = field(req, 'email');
        const password = field(req, 'password');

        const blank: Record<string, string> = {};
        if (!field(req, 'clientVersion')) blank.clientVersion = 'cannot be blank';
        if (field(req, 'clientType') !== 'BROWSER') blank.clientType = 'Invalid terminal type';
        if (!email) blank.email = 'cannot be blank';
        if (!password) blank.password = 'cannot be blank';

        const messages = Object.values(blank);
        if (messages.length > 0) {
            res.status(200).json({ code: 20000, message: messages[messages.length - 1], success: false, data: blank });
            return;
        }

        if (email !== this.login || password !== this.password) {
            failure(res, 20414, 'Account or password or country error');
            return;
        }

        success(res, { accessToken: this.accessToken, refreshToken: this.refreshToken });
    }
}
