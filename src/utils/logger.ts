import type { Ora } from "ora";

const DEBUG_NAMESPACE = 'yt-playlist-batch';

export class Logger {
    private spinner: Ora | null = null;

    constructor(private readonly debugEnabled = (process.env.DEBUG ?? '').includes(DEBUG_NAMESPACE)) {}

    setSpinner(spinner: Ora) {
        this.spinner = spinner;
    }

    clearSpinner() {
        this.spinner = null;
    }

    log(message: string) {
        if (this.spinner?.isSpinning) {
            this.spinner.text = message;
        } else {
            console.log(message);
        }
    }

    success(message: string) {
        console.log(`✓ ${message}`);
    }

    error(message: string) {
        console.error(`✗ ${message}`);
    }

    warn(message: string) {
        console.warn(`⚠ ${message}`);
    }

    info(message: string) {
        console.info(`ℹ ${message}`);
    }

    debug(message: string) {
        if (this.debugEnabled) {
            console.debug(`· ${message}`);
        }
    }
}

export const logger = new Logger();
