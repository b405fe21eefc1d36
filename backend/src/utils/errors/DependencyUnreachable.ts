/**
 * Raised by the startup gate once its attempt budget is spent. Fatal: the
 * service never binds its port.
 */
class DependencyUnreachable extends Error {
    readonly dependency: string;
    readonly attempts: number;
    readonly lastError: string;

    constructor(dependency: string, attempts: number, lastError: string) {
        super(`${dependency} unreachable after ${attempts} attempt(s): ${lastError}`);
        this.name = "DependencyUnreachable";
        this.dependency = dependency;
        this.attempts = attempts;
        this.lastError = lastError;
    }
}

export default DependencyUnreachable;
