/**
 * Keys pino blanks out before writing a line.
 */
export const REDACTION_CONFIG: { paths: string[]; censor: string } = {
  paths: [
    'token',
    'secret',
    'password',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',

    // Subprocess environments
    'env.*_TOKEN',
    'env.*_PASSWORD',

    'err.env.*_TOKEN',
  ],
  censor: '[REDACTED]',
};
