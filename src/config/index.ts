/**
 * Configuration Management
 * Runtime settings come from the environment (optionally a .env file);
 * upstream endpoints and the region list are fixed constants.
 */

import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';

loadEnv();

// src/config or dist/config -> package root
const PACKAGE_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..', '..');

export interface Config {
    catalog: {
        filePath: string;
    };

    http: {
        /** Per-request timeout in ms; 0 leaves the client default in place */
        requestTimeout: number;
    };

    logging: {
        level: string;
        pretty: boolean;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] ?? defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
}

export const config: Config = {
    catalog: {
        filePath: getEnv('PRICING_FILE_PATH', join(PACKAGE_ROOT, 'data', 'pricing.json')),
    },

    http: {
        requestTimeout: getEnvInt('PRICING_REQUEST_TIMEOUT', 0),
    },

    logging: {
        level: getEnv('LOG_LEVEL', 'info'),
        pretty: getEnvBool('LOG_PRETTY', true),
    },
};

// Legacy on-demand Linux endpoints, fetched in this order
export const LEGACY_PRICING_URLS = [
    // Deprecated instances (JSON)
    'https://aws.amazon.com/ec2/pricing/json/linux-od.json',
    // Previous generation instances (JavaScript callback)
    'https://a0.awsstatic.com/pricing/1/ec2/previous-generation/linux-od.min.js',
];

export const CALCULATOR_PRICING_URL =
    'https://calculator.aws/pricing/1.0/ec2/region/{region}/ondemand/{os}/index.json';

export const EC2_REGIONS = [
    'us-east-1',
    'us-east-2',
    'us-west-1',
    'us-west-2',
    'us-gov-west-1',
    'eu-west-1',
    'eu-west-2',
    'eu-west-3',
    'eu-north-1',
    'eu-central-1',
    'ca-central-1',
    'ap-southeast-1',
    'ap-southeast-2',
    'ap-northeast-1',
    'ap-northeast-2',
    'ap-south-1',
    'sa-east-1',
    'cn-north-1',
];

/**
 * Calculator OS identifier -> catalog product family, in fetch order
 */
export const OS_FAMILIES = {
    'linux': 'ec2_linux',
    'windows-std': 'ec2_windows',
} as const;

export type OperatingSystem = keyof typeof OS_FAMILIES;
export type ProductFamily = (typeof OS_FAMILIES)[OperatingSystem];

export const OPERATING_SYSTEMS: readonly OperatingSystem[] = ['linux', 'windows-std'];

// Legacy endpoints only ever carry Linux prices
export const LEGACY_FAMILY: ProductFamily = OS_FAMILIES.linux;
