import type { Settings } from './settings.js';
import { DdnsUpdater } from './services/ddnsUpdater.js';
import { HealthchecksService } from './services/healthchecks.js';
import { IpDetector } from './services/ipDetector.js';
import { Logger } from './services/logger.js';
import { PorkbunService } from './services/porkbun.js';
import { ConfigStore } from './services/storage.js';

export function createLogger(settings: Settings): Logger {
  return new Logger({ level: settings.logLevel, filePath: settings.logFile });
}

export function createDdnsUpdater(settings: Settings, logger: Logger): DdnsUpdater {
  const timeout = settings.httpTimeoutMs;

  return new DdnsUpdater({
    configStore: new ConfigStore(settings.configFile),
    ipResolver: new IpDetector({ url: settings.ipEchoUrl, timeout }, logger),
    dnsUpdater: new PorkbunService({ baseUrl: settings.porkbunApiUrl, timeout }, logger),
    livenessReporter: new HealthchecksService({ baseUrl: settings.healthchecksUrl, timeout }, logger),
    logger
  });
}
