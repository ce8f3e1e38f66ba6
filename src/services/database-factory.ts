import { ConfigManager } from '../utils/config';
import { Logger } from '../utils/logger';
import type { OrderStore } from './order-store';
import { SQLiteOrderStore } from './sqlite-order-store';
import { MySQLOrderStore } from './mysql-order-store';

export class DatabaseFactory {
  /**
   * Build the store selected by DB_TYPE (SQLite unless mysql is asked for)
   */
  static createStore(config: ConfigManager = ConfigManager.getInstance()): OrderStore {
    const logger = new Logger('DatabaseFactory');

    if (config.getStoreType() === 'mysql') {
      const mysqlConfig = config.getMySQLConfig();
      logger.info(`Selecting MySQL store (${mysqlConfig.host}:${mysqlConfig.port}/${mysqlConfig.database})`);
      return new MySQLOrderStore(mysqlConfig);
    }

    const sqliteConfig = config.getSQLiteConfig();
    logger.info(`Selecting SQLite store (${sqliteConfig.databasePath})`);
    return new SQLiteOrderStore(sqliteConfig);
  }
}
