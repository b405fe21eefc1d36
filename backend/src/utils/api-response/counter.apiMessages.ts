export const counterApiMessage = {
    welcome: "Welcome to my Flask app",
    visited: (count: number) => `This page has been visited ${count} times.`,
}

export const versionApiMessage = {
    mysqlVersion: (version: string) => `Hello, World! MySQL version: ${version}`,
    noVersionRow: "SELECT VERSION() returned no rows",
    nonStringVersion: "SELECT VERSION() returned a non-string value",
}

export const routeApiMessage = {
    routeNotFound: (method: string, path: string) => `Route ${method} ${path} not found`,
    internalError: "Internal Server Error",
}
