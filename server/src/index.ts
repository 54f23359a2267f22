import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';

const config = loadConfig();
const db = openDatabase(config.databasePath);
const app = createApp({ db, config });

app.listen(config.port, () => {
  console.log(`Pocket Ledger running on http://localhost:${config.port}`);
  console.log(`Database: ${config.databasePath}`);
});
