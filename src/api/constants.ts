/**
 * Constants sourced from the Reveal web account portal.
 */
export const API_HOST = 'https://api.reveal.ishareit.net';
export const API_VERSION = 'v1';
export const USER_AGENT = 'RevealWeb/5.4.0';
export const PORTAL_ORIGIN = 'https://account.revealcellcam.com';

export const COGNITO_REGION = 'us-east-1';
export const COGNITO_CLIENT_ID = '6r9tpojvgvkci5trla0ip14mon';
// USER_PASSWORD_AUTH and REFRESH_TOKEN_AUTH only send the client id; the pool id selects the region.
export const COGNITO_USER_POOL_ID = `${COGNITO_REGION}_RevealCellCam`;

export const DEFAULT_POLL_INTERVAL_SECONDS = 300;
export const MIN_POLL_INTERVAL_SECONDS = 60;
export const DEFAULT_MAX_CONCURRENT_FETCHES = 3;
export const DEFAULT_PHOTO_SAMPLE_SIZE = 100;
export const AVERAGE_WINDOW = 10;

export const SESSION_MIN_MARGIN_MS = 5 * 60 * 1000;
export const MEDIA_URL_LIFETIME_MS = 7 * 24 * 60 * 60 * 1000;
export const HTTP_TIMEOUT_MS = 30 * 1000;
export const UNAVAILABLE_AFTER_AUTH_FAILURES = 3;
