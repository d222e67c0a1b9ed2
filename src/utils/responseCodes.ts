export const OK = 200;
export const BAD_REQUEST = 400;
export const NOT_FOUND = 404;
export const INTERNAL_SERVER_ERROR = 500;
export const SERVICE_UNAVAILABLE = 503;

export const INDEX_STORE_UNAVAILABLE = "INDEX_STORE_UNAVAILABLE";
