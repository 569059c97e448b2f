/**
 * Settings a configuration source can provide for the global scope.
 */
export class SourceSettings {
    baseUrl?: string;
    timeoutMs?: number;
    headers?: Record<string, string>;
}

/**
 * ConfigurationSource - read-only supplier of template variables and global
 * defaults. Read once, when a ClientConfig is built from it.
 */
export interface ConfigurationSource {
    variables(): Readonly<Record<string, string>>;
    settings(): SourceSettings;
}

export class StaticConfigurationSource implements ConfigurationSource {
    constructor(
        private readonly vars: Record<string, string> = {},
        private readonly defaults: SourceSettings = {},
    ) {}

    variables(): Readonly<Record<string, string>> {
        return { ...this.vars };
    }

    settings(): SourceSettings {
        return { ...this.defaults };
    }
}

/**
 * EnvConfigurationSource - configuration from environment variables.
 *
 * With the default prefix:
 * - WIRECALL_VAR_<name>  → template variable <name> (e.g. WIRECALL_VAR_region=eu-1 fills {region})
 * - WIRECALL_BASE_URL    → ClientConfig.baseUrl
 * - WIRECALL_TIMEOUT_MS  → global timeout
 */
export class EnvConfigurationSource implements ConfigurationSource {
    constructor(
        private readonly prefix: string = 'WIRECALL_',
        private readonly env: NodeJS.ProcessEnv = process.env,
    ) {}

    variables(): Readonly<Record<string, string>> {
        const marker = `${this.prefix}VAR_`;
        const vars: Record<string, string> = {};
        for (const [key, value] of Object.entries(this.env)) {
            if (key.startsWith(marker) && key.length > marker.length && value !== undefined) {
                vars[key.slice(marker.length)] = value;
            }
        }
        return vars;
    }

    settings(): SourceSettings {
        const settings: SourceSettings = {};
        const baseUrl = this.env[`${this.prefix}BASE_URL`];
        if (baseUrl !== undefined && baseUrl !== '') {
            settings.baseUrl = baseUrl;
        }

        const timeoutName = `${this.prefix}TIMEOUT_MS`;
        const rawTimeout = this.env[timeoutName];
        if (rawTimeout !== undefined && rawTimeout !== '') {
            const timeoutMs = Number(rawTimeout);
            if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
                throw new Error(`${timeoutName} must be a positive number of milliseconds, got '${rawTimeout}'`);
            }
            settings.timeoutMs = timeoutMs;
        }
        return settings;
    }
}
