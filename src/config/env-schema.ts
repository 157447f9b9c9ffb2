/**
 * Registry of every environment key the updater reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional' | 'conditional'.
 *   - `condition`   Feature gate that makes a conditional key applicable.
 *   - `format`      Shape checked by the validator when the key is present.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

/**
 * Feature gates used by `condition`.
 * - 'notify:email'  active when SMTP_HOST is set
 * - 'panel:online'  active unless DEV_MODE is true
 */
export type ConfigCondition = 'notify:email' | 'panel:online';

export type ConfigKeyFormat =
  | 'url'
  | 'positive-integer'
  | 'non-negative-integer'
  | 'port'
  | 'boolean'
  | 'log-level'
  | 'email-list'
  | 'text';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  /** Applies only when class === 'conditional'. */
  condition?: ConfigCondition;
  format: ConfigKeyFormat;
  /** Used when the key is absent. */
  defaultValue?: string;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Control panel ───────────────────────────────────────────────────────────
  {
    key: 'CRAFTY_API_URL',
    type: 'env',
    class: 'conditional',
    condition: 'panel:online',
    format: 'url',
    description: 'Base URL of the Crafty Controller panel.',
    remediation: 'Set CRAFTY_API_URL to the panel address, e.g. https://localhost:8443.',
  },
  {
    key: 'CRAFTY_API_TOKEN',
    type: 'secret',
    class: 'conditional',
    condition: 'panel:online',
    format: 'text',
    description: 'Bearer token used to call the panel API.',
    remediation: 'Create an API token in the panel and set CRAFTY_API_TOKEN.',
  },
  {
    key: 'DEV_MODE',
    type: 'env',
    class: 'optional',
    format: 'boolean',
    defaultValue: 'false',
    description: 'Use the in-memory panel and tolerate missing instance directories.',
    remediation: "Set DEV_MODE to 'true' or 'false'.",
  },

  // ── Storage ─────────────────────────────────────────────────────────────────
  {
    key: 'BACKUP_DIR',
    type: 'env',
    class: 'required',
    format: 'text',
    description: 'Directory that holds instance snapshots.',
    remediation: 'Set BACKUP_DIR to a writable directory.',
  },
  {
    key: 'LOG_DIR',
    type: 'env',
    class: 'required',
    format: 'text',
    description: 'Directory that holds the daily update logs.',
    remediation: 'Set LOG_DIR to a writable directory.',
  },
  {
    key: 'SCRATCH_DIR',
    type: 'env',
    class: 'optional',
    format: 'text',
    description: 'Parent directory for the per-run download and extraction area.',
    remediation: 'Set SCRATCH_DIR to a writable directory, or leave it unset to use the OS temp directory.',
  },
  {
    key: 'SERVER_LIST_FILE',
    type: 'env',
    class: 'optional',
    format: 'text',
    defaultValue: 'config/server-list.json',
    description: 'Instance registry and file protection policy.',
    remediation: 'Point SERVER_LIST_FILE at a server-list.json file.',
  },
  {
    key: 'BACKUP_RETENTION_DAYS',
    type: 'env',
    class: 'optional',
    format: 'positive-integer',
    defaultValue: '7',
    description: 'Snapshots older than this many days are pruned after a successful update.',
    remediation: 'Set BACKUP_RETENTION_DAYS to a positive integer.',
  },
  {
    key: 'LOG_RETENTION_DAYS',
    type: 'env',
    class: 'optional',
    format: 'positive-integer',
    defaultValue: '30',
    description: 'Log files older than this many days are pruned.',
    remediation: 'Set LOG_RETENTION_DAYS to a positive integer.',
  },

  // ── Release feed ────────────────────────────────────────────────────────────
  {
    key: 'RELEASE_FEED_URL',
    type: 'env',
    class: 'optional',
    format: 'url',
    description: 'Upstream download manifest URL.',
    remediation: 'Set RELEASE_FEED_URL to an http(s) URL or leave it unset for the default feed.',
  },
  {
    key: 'RELEASE_PLATFORM',
    type: 'env',
    class: 'optional',
    format: 'text',
    defaultValue: 'serverBedrockLinux',
    description: 'downloadType of the manifest link to install.',
    remediation: 'Set RELEASE_PLATFORM to a downloadType present in the manifest.',
  },
  {
    key: 'RELEASE_MANIFEST_FILE',
    type: 'env',
    class: 'optional',
    format: 'text',
    description: 'Local manifest file used instead of the feed in dev mode.',
    remediation: 'Point RELEASE_MANIFEST_FILE at a JSON manifest file.',
  },
  {
    key: 'MIN_ARTIFACT_BYTES',
    type: 'env',
    class: 'optional',
    format: 'positive-integer',
    defaultValue: '1000000',
    description: 'Downloads smaller than this are rejected as truncated.',
    remediation: 'Set MIN_ARTIFACT_BYTES to a positive integer.',
  },

  // ── Timing ──────────────────────────────────────────────────────────────────
  {
    key: 'SERVER_TIMEOUT',
    type: 'env',
    class: 'optional',
    format: 'positive-integer',
    defaultValue: '30',
    description: 'Seconds to wait for a server to stop or start.',
    remediation: 'Set SERVER_TIMEOUT to a positive number of seconds.',
  },
  {
    key: 'SERVER_START_WAIT',
    type: 'env',
    class: 'optional',
    format: 'non-negative-integer',
    defaultValue: '20',
    description: 'Seconds to let servers stabilize before verification.',
    remediation: 'Set SERVER_START_WAIT to a number of seconds (0 or more).',
  },
  {
    key: 'DOWNLOAD_TIMEOUT',
    type: 'env',
    class: 'optional',
    format: 'positive-integer',
    defaultValue: '300',
    description: 'Seconds allowed for the release download.',
    remediation: 'Set DOWNLOAD_TIMEOUT to a positive number of seconds.',
  },
  {
    key: 'POLL_INTERVAL_MS',
    type: 'env',
    class: 'optional',
    format: 'positive-integer',
    defaultValue: '2000',
    description: 'Delay between panel status checks while waiting for a state change.',
    remediation: 'Set POLL_INTERVAL_MS to a positive number of milliseconds.',
  },

  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'LOG_LEVEL',
    type: 'env',
    class: 'optional',
    format: 'log-level',
    defaultValue: 'info',
    description: 'Minimum level written to the log.',
    remediation: "Set LOG_LEVEL to one of 'debug', 'info', 'warn', 'error'.",
  },
  {
    key: 'DRY_RUN',
    type: 'env',
    class: 'optional',
    format: 'boolean',
    defaultValue: 'false',
    description: 'Check for updates without changing anything.',
    remediation: "Set DRY_RUN to 'true' or 'false'.",
  },
  {
    key: 'UPDATE_CRON',
    type: 'env',
    class: 'optional',
    format: 'text',
    defaultValue: '0 4 * * *',
    description: 'Schedule used by the `schedule` command.',
    remediation: 'Set UPDATE_CRON to a five- or six-field cron expression.',
  },

  // ── Email notifications ─────────────────────────────────────────────────────
  {
    key: 'SMTP_HOST',
    type: 'env',
    class: 'optional',
    format: 'text',
    description: 'SMTP server; setting it enables email notifications.',
    remediation: 'Set SMTP_HOST to enable email notifications.',
  },
  {
    key: 'SMTP_PORT',
    type: 'env',
    class: 'optional',
    format: 'port',
    defaultValue: '587',
    description: 'SMTP port.',
    remediation: 'Set SMTP_PORT to an integer in range 1-65535.',
  },
  {
    key: 'SMTP_SECURE',
    type: 'env',
    class: 'optional',
    format: 'boolean',
    defaultValue: 'false',
    description: 'Use implicit TLS (usually port 465).',
    remediation: "Set SMTP_SECURE to 'true' or 'false'.",
  },
  {
    key: 'SMTP_USER',
    type: 'env',
    class: 'optional',
    format: 'text',
    description: 'SMTP login name.',
    remediation: 'Set SMTP_USER when the SMTP server requires authentication.',
  },
  {
    key: 'SMTP_PASSWORD',
    type: 'secret',
    class: 'optional',
    format: 'text',
    description: 'SMTP password.',
    remediation: 'Set SMTP_PASSWORD when the SMTP server requires authentication.',
  },
  {
    key: 'SMTP_FROM',
    type: 'env',
    class: 'conditional',
    condition: 'notify:email',
    format: 'text',
    description: 'Sender address for notifications.',
    remediation: 'Set SMTP_FROM, e.g. updater@example.com.',
  },
  {
    key: 'SMTP_TO',
    type: 'env',
    class: 'conditional',
    condition: 'notify:email',
    format: 'email-list',
    description: 'Comma-separated recipient addresses.',
    remediation: 'Set SMTP_TO to one or more comma-separated addresses.',
  },
  {
    key: 'NOTIFY_ON_NO_UPDATE',
    type: 'env',
    class: 'optional',
    format: 'boolean',
    defaultValue: 'false',
    description: 'Also email when no update was needed.',
    remediation: "Set NOTIFY_ON_NO_UPDATE to 'true' or 'false'.",
  },
];

export const CONFIG_KEYS: ReadonlySet<string> = new Set(CONFIG_SCHEMA.map((spec) => spec.key));
