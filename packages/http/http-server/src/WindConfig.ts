import { Type, plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, Max, Min, ValidationError, validateSync } from 'class-validator';
import { ConfigurationError } from '@wind/http-api';

/**
 * Configuration for the wind server.
 * Validated with class-validator before the server is created.
 */
export class WindConfig {
    @IsString()
    @IsNotEmpty()
    host: string = '127.0.0.1';

    @Type(() => Number)
    @IsInt()
    @Min(0)
    @Max(65535)
    port: number = 9000;

    /**
     * Deadline for asynchronous resources, in milliseconds. 0 disables it.
     */
    @Type(() => Number)
    @IsInt()
    @Min(0)
    requestTimeoutMs: number = 0;

    @Type(() => Number)
    @IsInt()
    @Min(256)
    maxHeaderBytes: number = 8 * 1024;

    /**
     * Largest Content-Length the transport buffers; larger bodies get 413.
     */
    @Type(() => Number)
    @IsInt()
    @Min(0)
    maxBodyBytes: number = 1024 * 1024;

    /**
     * Build a config from plain values (strings are converted), applying
     * defaults for missing keys.
     */
    static from(plain: Record<string, unknown>): WindConfig {
        const config = plainToInstance(WindConfig, plain);
        config.validate();
        return config;
    }

    /**
     * Read WIND_HOST, WIND_PORT, WIND_REQUEST_TIMEOUT_MS, WIND_MAX_HEADER_BYTES
     * and WIND_MAX_BODY_BYTES.
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env): WindConfig {
        const plain: Record<string, unknown> = {};
        const mapping: Array<[string, keyof WindConfig]> = [
            ['WIND_HOST', 'host'],
            ['WIND_PORT', 'port'],
            ['WIND_REQUEST_TIMEOUT_MS', 'requestTimeoutMs'],
            ['WIND_MAX_HEADER_BYTES', 'maxHeaderBytes'],
            ['WIND_MAX_BODY_BYTES', 'maxBodyBytes'],
        ];
        for (const [variable, key] of mapping) {
            const value = env[variable];
            if (value !== undefined) {
                plain[key] = value;
            }
        }
        return WindConfig.from(plain);
    }

    /**
     * Throws ConfigurationError listing every failed constraint.
     */
    validate(): void {
        const errors = validateSync(this);
        if (errors.length > 0) {
            throw new ConfigurationError(`Invalid WindConfig: ${WindConfig.describe(errors)}`);
        }
    }

    private static describe(errors: ValidationError[]): string {
        return errors
            .map((error) => Object.values(error.constraints ?? {}).join(', '))
            .join('; ');
    }
}

/**
 * DI token for WindConfig injection.
 */
export const WIND_CONFIG_TOKEN = Symbol.for('WindConfig');
