interface IApiErrorRes {
    status: boolean;
    statusCode: number;
    message: string;
}

class ApiErrorResponse extends Error implements IApiErrorRes {
    status: boolean;
    statusCode: number;
    constructor(statusCode: number, message: string) {
        super(message);
        this.name = "ApiErrorResponse";
        this.status = false;
        this.statusCode = statusCode;
    }

    // Error#message is not enumerable, so it is spelled out for res.json()
    toJSON(): IApiErrorRes {
        return { status: this.status, statusCode: this.statusCode, message: this.message };
    }
}

export default ApiErrorResponse;
