import { Logger } from './logger.js';
import { ConfigStore } from './storage.js';
import { ConfigError, DdnsError, NetworkError, UpdateRejectedError } from '../types/errors.js';
import type {
  Config,
  ConfigRepository,
  Credentials,
  DnsRecordUpdater,
  IpResolver,
  LivenessReporter,
  RunResult
} from '../types/index.js';

export const EXIT_SUCCESS = 0;
export const EXIT_UPDATE_REJECTED = 1;
export const EXIT_ABORTED = 2;

export const NO_CHANGE_MESSAGE = 'No change';

type RunState = Pick<RunResult, 'ipChanged' | 'currentIp'>;

export interface DdnsUpdaterDependencies {
  configStore: ConfigRepository;
  ipResolver: IpResolver;
  dnsUpdater: DnsRecordUpdater;
  livenessReporter: LivenessReporter;
  logger: Logger;
}

export class DdnsUpdater {
  private readonly configStore: ConfigRepository;
  private readonly ipResolver: IpResolver;
  private readonly dnsUpdater: DnsRecordUpdater;
  private readonly livenessReporter: LivenessReporter;
  private readonly logger: Logger;

  constructor({ configStore, ipResolver, dnsUpdater, livenessReporter, logger }: DdnsUpdaterDependencies) {
    this.configStore = configStore;
    this.ipResolver = ipResolver;
    this.dnsUpdater = dnsUpdater;
    this.livenessReporter = livenessReporter;
    this.logger = logger;
  }

  /**
   * Check the public IP once and push it to the DNS provider if it moved.
   *
   * Configuration and network failures end the run with `EXIT_ABORTED`; a
   * rejected update ends it with `EXIT_UPDATE_REJECTED` before anything is
   * saved or reported. Any other error propagates.
   */
  async run(): Promise<RunResult> {
    let config: Config;

    try {
      config = this.configStore.load();
    } catch (error) {
      return this.abortOnConfigError(error, { ipChanged: false, currentIp: null });
    }

    const { domain, lastIP, healthchecksUUID } = config;

    this.logger.info('Getting current IP');

    const resolved = await this.ipResolver.resolve();

    if (!resolved.success) {
      return this.abort(resolved.error, { ipChanged: false, currentIp: null });
    }

    const currentIp = resolved.data;

    this.logger.info(`Last IP: ${lastIP || '(none)'}`);
    this.logger.info(`Current IP: ${currentIp}`);

    const ipChanged = currentIp !== lastIP;
    const state = { ipChanged, currentIp };
    let message: string;

    if (ipChanged) {
      let credentials: Credentials;

      try {
        credentials = ConfigStore.getCredentials(config);
      } catch (error) {
        return this.abortOnConfigError(error, state);
      }

      this.logger.info(`Updating 'A' record for ${domain} with ${currentIp}`, {
        provider: this.dnsUpdater.name
      });

      const updated = await this.dnsUpdater.update(domain, credentials, currentIp);

      if (!updated.success) {
        return this.abort(updated.error, state);
      }

      if (!updated.data) {
        // No save and no ping: the run failed end to end
        const error = new UpdateRejectedError(domain);
        this.logger.error('Error updating record', error, { domain, currentIp, lastIP });

        return { exitCode: EXIT_UPDATE_REJECTED, ...state, message: error.message };
      }

      message = `Updated 'A' record for ${domain} with ${currentIp}`;

      this.logger.info('Update successful, saving config data', { path: this.configStore.path });

      config.lastIP = currentIp;

      try {
        this.configStore.save(config);
      } catch (error) {
        return this.abortOnConfigError(error, state);
      }
    } else {
      message = NO_CHANGE_MESSAGE;
      this.logger.info(message);
    }

    if (healthchecksUUID) {
      this.logger.info('Pinging Healthchecks.io');

      const pinged = await this.livenessReporter.ping(healthchecksUUID, message);

      if (!pinged.success) {
        return this.abort(pinged.error, state);
      }
    }

    this.logger.info('Finished');

    return { exitCode: EXIT_SUCCESS, ...state, message };
  }

  private abortOnConfigError(error: unknown, state: RunState): RunResult {
    if (error instanceof ConfigError) {
      return this.abort(error, state);
    }

    throw error;
  }

  private abort(error: DdnsError, state: RunState): RunResult {
    const context = error instanceof NetworkError ? { code: error.code, url: error.url } : { code: error.code };

    this.logger.error('Run aborted', error, context);

    return { exitCode: EXIT_ABORTED, ...state, message: error.message };
  }
}
