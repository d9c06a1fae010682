export const HTTP_STATUS = {
    OK: 200,
    SERVICE_UNAVAILABLE: 503,
} as const;

export const SERVICE_NAME = 'circles-service';
export const SERVICE_VERSION = '1.0.0';
