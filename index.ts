import { createStationApp } from './src/server/create-station-app.js';
import { startServer } from './src/server/start-server.js';
import { PORT, loadStationConfig, type StationConfig } from './src/server/runtime.js';
import { ConfigError } from './src/utils/errors.js';

const loadConfigOrExit = (): StationConfig => {
  try {
    return loadStationConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }
    throw error;
  }
};

const config = loadConfigOrExit();
const { app } = createStationApp({ config });

console.log(`[Config] Station ${config.stationId}, units ${config.units}, fetch buffer ${config.fetchBufferSeconds}s`);

startServer({ app, port: PORT });
