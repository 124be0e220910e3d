import { describe, expect, it } from 'vitest';
import { readConfig } from './config';

describe('readConfig', () => {
    it('applies defaults', () => {
        expect(readConfig({})).toEqual({
            logLevel: 'info',
            ecos: {
                datacenter: 'EU',
                url: undefined,
                email: undefined,
                password: undefined,
                accessToken: undefined,
                refreshToken: undefined,
                timeout: 30000,
            },
        });
    });

    it('reads the ECOS variables', () => {
        const config = readConfig({
            ECOS_DATACENTER: 'AU',
            ECOS_URL: 'https://ecos.example.test',
            ECOS_EMAIL: 'test@example.com',
            ECOS_PASSWORD: 'test-password',
            ECOS_ACCESS_TOKEN: 'test-access-token',
            ECOS_REFRESH_TOKEN: 'test-refresh-token',
            ECOS_TIMEOUT: '5000',
        });

        expect(config.ecos).toEqual({
            datacenter: 'AU',
            url: 'https://ecos.example.test',
            email: 'test@example.com',
            password: 'test-password',
            accessToken: 'test-access-token',
            refreshToken: 'test-refresh-token',
            timeout: 5000,
        });
    });

    it('treats empty values as unset', () => {
        expect(readConfig({ ECOS_DATACENTER: '', ECOS_EMAIL: '' }).ecos).toMatchObject({
            datacenter: 'EU',
            email: undefined,
        });
    });

    it('reads the log level', () => {
        expect(readConfig({ LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
    });

    it('rejects a timeout that is not a positive number', () => {
        expect(() => readConfig({ ECOS_TIMEOUT: 'soon' })).toThrow('config_invalid: ECOS_TIMEOUT');
        expect(() => readConfig({ ECOS_TIMEOUT: '0' })).toThrow('config_invalid: ECOS_TIMEOUT');
    });
});
