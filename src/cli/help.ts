/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

import { DEFAULT_CONFIG_FILE, DEFAULT_LOG_FILE } from '../types/run-config';
import { DEFAULT_BIN_PATH } from '../install/environment';

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: dockstart [run] [options]
       dockstart install [--yes] [--bin-path <path>]

Starts stopped Docker containers whose restart policy is "always" or
"unless-stopped" (the latter only after a non-zero exit, or with --force).

Run options:
  --retry                       Wait for Docker and jq instead of failing at once
  --retry-interval <seconds>    Seconds between availability checks (default: 5)
  --max-wait <seconds>          Maximum wait per readiness group (default: 120)
  --force                       Start stopped unless-stopped containers regardless of exit code
  --log-file <path>             Log file (default: ${DEFAULT_LOG_FILE})
  --log-size <size>             Truncate the log at start when larger, e.g. 512K, 1M (default: 1M)
  --no-log                      Do not write a log file
  --config <path>               JSON config file (default: $DOCKSTART_CONFIG or ${DEFAULT_CONFIG_FILE})
  --verbose                     Mirror log events on the console

Install options:
  -y, --yes                     Answer yes to confirmations
  --bin-path <path>             Executable to register at boot (default: ${DEFAULT_BIN_PATH})

  -h, --help                    Show this help message
  -v, --version                 Show version number

Examples:
  dockstart
  dockstart --retry --force
  dockstart --retry --retry-interval 10 --max-wait 300
  dockstart --log-file /tmp/dockstart.log --log-size 512K
  sudo dockstart install
  sudo dockstart install --yes --bin-path /opt/dockstart/bin/dockstart`;
}
