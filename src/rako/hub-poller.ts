// src/rako/hub-poller.ts
import type { HubLogger } from './logger.js';

export const DEFAULT_DISCOVERY_RETRY_SECONDS = 60;

export interface HubPollerOptions {
	pollIntervalSeconds: number;
	discoveryRetrySeconds?: number;
	/** Resolves true once the hub's channels have been loaded. */
	discover: () => Promise<boolean>;
	poll: () => Promise<void>;
	log: HubLogger;
}

/**
 * Drives discovery and level polling from a single timer.
 *
 * Until discovery succeeds every tick retries it. After that each tick polls
 * levels, or the timer stops when polling is disabled. Ticks never overlap:
 * the next one is armed only when the previous one has finished.
 */
export class HubPoller {
	private readonly pollIntervalSeconds: number;
	private readonly discoveryRetrySeconds: number;
	private readonly discover: () => Promise<boolean>;
	private readonly poll: () => Promise<void>;
	private readonly log: HubLogger;

	private timer: NodeJS.Timeout | null = null;
	private discovered = false;
	private stopped = true;

	constructor(options: HubPollerOptions) {
		this.pollIntervalSeconds = options.pollIntervalSeconds;
		this.discoveryRetrySeconds = options.discoveryRetrySeconds ?? DEFAULT_DISCOVERY_RETRY_SECONDS;
		this.discover = options.discover;
		this.poll = options.poll;
		this.log = options.log;
	}

	public get isDiscovered(): boolean {
		return this.discovered;
	}

	public start(): Promise<void> {
		this.stop();
		this.stopped = false;
		return this.tick();
	}

	public stop(): void {
		this.stopped = true;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	private async tick(): Promise<void> {
		this.timer = null;

		try {
			if (this.discovered) {
				await this.poll();
			} else {
				this.discovered = await this.discover();
				if (this.discovered) {
					await this.poll();
				}
			}
		} catch (err) {
			this.log.warn('Rako: poll cycle failed: %s', err instanceof Error ? err.message : String(err));
		}

		this.schedule();
	}

	private schedule(): void {
		if (this.stopped) {
			return;
		}

		if (!this.discovered) {
			this.log.info('Rako: retrying discovery in %d s.', this.discoveryRetrySeconds);
			this.arm(this.discoveryRetrySeconds);
			return;
		}

		if (this.pollIntervalSeconds <= 0) {
			this.log.info('Rako: level polling disabled.');
			return;
		}
		this.arm(this.pollIntervalSeconds);
	}

	private arm(seconds: number): void {
		this.timer = setTimeout(() => {
			void this.tick();
		}, seconds * 1000);
	}
}
