import BackendUnavailable from "./BackendUnavailable";
import DependencyUnreachable from "./DependencyUnreachable";
import ConfigError from "./ConfigError";

export { BackendUnavailable, DependencyUnreachable, ConfigError }
