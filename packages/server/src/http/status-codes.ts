export type ClientErrorStatusCode = 400 | 404 | 405 | 409 | 413 | 415 | 422 | 429

export type ServerErrorStatusCode = 500 | 502 | 503 | 504

export type ErrorStatusCode = ClientErrorStatusCode | ServerErrorStatusCode
