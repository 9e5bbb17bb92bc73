// src/services/base/BaseService.ts
import type { ServiceConfig, Logger } from './types';

export abstract class BaseService {
  protected logger: Logger;

  constructor(config: ServiceConfig) {
    this.logger = config.logger;
  }
}
