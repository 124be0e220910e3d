import { config as loadDotenv } from 'dotenv';

export default interface IConfig {
    logLevel: string;
    ecos: IConfigEcos;
}

export interface IConfigEcos {
    datacenter: string;
    url?: string;
    email?: string;
    password?: string;
    accessToken?: string;
    refreshToken?: string;
    timeout: number;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): IConfig {
    if (env === process.env) {
        loadDotenv({ path: env.DOTENV_CONFIG_PATH });
    }

    return {
        logLevel: readValue(env, 'LOG_LEVEL', 'info'),
        ecos: {
            datacenter: readValue(env, 'ECOS_DATACENTER', 'EU'),
            url: readOptional(env, 'ECOS_URL'),
            email: readOptional(env, 'ECOS_EMAIL'),
            password: readOptional(env, 'ECOS_PASSWORD'),
            accessToken: readOptional(env, 'ECOS_ACCESS_TOKEN'),
            refreshToken: readOptional(env, 'ECOS_REFRESH_TOKEN'),
            timeout: readNumber(env, 'ECOS_TIMEOUT', 30000),
        },
    };
}

function readOptional(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name];
    return value ? value : undefined;
}

function readValue(env: NodeJS.ProcessEnv, name: string, defaultValue: string): string {
    return readOptional(env, name) ?? defaultValue;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
    const value = readOptional(env, name);
    if (value === undefined) return defaultValue;

    const parsed = parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed <= 0) {
        throw new Error(`config_invalid: ${name}`);
    }
    return parsed;
}
