import { ConfigurationError } from '@wind/http-api';
import { WindConfig } from '../WindConfig';

describe('WindConfig', () => {
    it('should default every field', () => {
        const config = new WindConfig();

        expect(config.host).toBe('127.0.0.1');
        expect(config.port).toBe(9000);
        expect(config.requestTimeoutMs).toBe(0);
        expect(config.maxHeaderBytes).toBe(8192);
        expect(() => config.validate()).not.toThrow();
    });

    it('should convert string values from the environment', () => {
        const config = WindConfig.fromEnv({
            WIND_HOST: '0.0.0.0',
            WIND_PORT: '8080',
            WIND_REQUEST_TIMEOUT_MS: '2500',
        });

        expect(config.host).toBe('0.0.0.0');
        expect(config.port).toBe(8080);
        expect(config.requestTimeoutMs).toBe(2500);
        expect(config.maxHeaderBytes).toBe(8192);
    });

    it('should read the body limit from the environment', () => {
        expect(new WindConfig().maxBodyBytes).toBe(1024 * 1024);
        expect(WindConfig.fromEnv({ WIND_MAX_BODY_BYTES: '2048' }).maxBodyBytes).toBe(2048);
        expect(() => WindConfig.from({ maxBodyBytes: -1 })).toThrow('maxBodyBytes must not be less than 0');
    });

    it('should reject a port out of range', () => {
        expect(() => WindConfig.from({ port: 70000 })).toThrow(ConfigurationError);
        expect(() => WindConfig.from({ port: 70000 })).toThrow('port must not be greater than 65535');
    });

    it('should reject a port that is not a number', () => {
        expect(() => WindConfig.fromEnv({ WIND_PORT: 'eighty' })).toThrow('port must be an integer number');
    });

    it('should reject a header limit too small to hold a request line', () => {
        expect(() => WindConfig.from({ maxHeaderBytes: 16 })).toThrow('maxHeaderBytes must not be less than 256');
    });
});
