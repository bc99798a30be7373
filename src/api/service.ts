export const SERVICE_NAME = 'Invoice QC Service';
export const SERVICE_VERSION = '1.0.0';

/** Public routes, listed by `GET /` and by the 404 response. */
export const ENDPOINTS = {
  root: 'GET /',
  health: 'GET /health',
  api_info: 'GET /api/info',
  rules: 'GET /rules',
  validate_json: 'POST /validate-json',
  extract_and_validate: 'POST /extract-and-validate',
  docs: 'GET /docs',
} as const;
