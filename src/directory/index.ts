import type { Logger } from 'pino';
import type { DirectoryConfig } from '../config/index.js';
import { HttpDirectoryValidator } from './http.js';
import { StaticDirectoryValidator } from './static.js';
import type { DirectoryValidator } from './types.js';

export function createDirectoryValidator(config: DirectoryConfig, logger: Logger): DirectoryValidator {
  switch (config.type) {
    case 'http':
      return new HttpDirectoryValidator(config.url, logger);

    case 'static':
      if (config.users.length === 0) {
        logger.warn('Static directory has no users; every credential will be rejected');
      }
      return new StaticDirectoryValidator(config.users);
  }
}
