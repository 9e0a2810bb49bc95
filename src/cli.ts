import { DEFAULT_CONFIG_FILE } from './config';

export const APP_NAME = 'wavelog-transport';
export const APP_VERSION = '0.0.2';

export interface CliOptions {
    help: boolean;
    test: boolean;
    configFile: string;
}

/**
 * Parse argv (without the node and script entries)
 */
export function parseArgs(args: string[]): CliOptions {
    const options: CliOptions = {
        help: false,
        test: false,
        configFile: DEFAULT_CONFIG_FILE,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--test' || arg === '-t') {
            options.test = true;
        } else if (arg === '--config' || arg === '-c') {
            const next = args[i + 1];
            if (next !== undefined) {
                options.configFile = next;
                i++;
            }
        } else if (i === 0 && !arg.startsWith('-')) {
            options.configFile = arg;
        }
    }

    return options;
}

export function usage(): string {
    return [
        `${APP_NAME} ${APP_VERSION} - forwards QSOs from WSJT-X/N1MM to Wavelog`,
        '',
        'Usage:',
        `  ${APP_NAME} [options] [config.json]`,
        '',
        'Options:',
        '  -h, --help           Show this help message',
        '  -t, --test           Test Wavelog connection',
        '  -c, --config FILE    Use specified config file',
        '',
        `Default config file: ${DEFAULT_CONFIG_FILE}`,
        '',
        'Environment overrides:',
        '  WAVELOG_URL, WAVELOG_API_KEY, WAVELOG_STATION_PROFILE_ID,',
        '  WAVELOG_TRANSPORT_PORT, WAVELOG_TRANSPORT_VERBOSE',
    ].join('\n');
}
