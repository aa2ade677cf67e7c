import path from 'node:path';
import { createDefaultDeps } from './bootstrap.js';
import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { RunService } from './services/run-service.js';
import { RunStore } from './services/run-store.js';

const configPath = process.argv[2] || undefined;
const config = loadConfig(configPath);

const stateFile = path.join(config.outputRoot, '.tv', 'state.json');
const runStore = new RunStore(stateFile);
runStore.load();
runStore.save();

const runService = new RunService(runStore, createDefaultDeps(config));
const app = createServer({ runService, runStore, config });

const port = config.dashboard.port;

app.listen(port, () => {
  console.log(`\n  Theorem Video Pipeline`);
  console.log(`  ──────────────────────`);
  console.log(`  API:         http://localhost:${port}/api/runs`);
  console.log(`  State file:  ${stateFile}`);
  console.log(`  Output root: ${config.outputRoot}`);
  console.log(`  Scenes:      ${config.pipeline.maxConcurrentScenes} concurrent, ${config.pipeline.maxRetries} attempt(s) each`);
  console.log('');
});
