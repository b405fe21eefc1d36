class ConfigError extends Error {
    constructor(detail: string) {
        super(`Invalid configuration: ${detail}`);
        this.name = "ConfigError";
    }
}

export default ConfigError;
