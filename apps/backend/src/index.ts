import 'dotenv/config';
import { createApp } from './app.js';
import { loadSettings } from './config/env.js';

const settings = loadSettings();
const app = createApp(settings);

// ─── Start ──────────────────────────────────────────────
app.listen(settings.port, () => {
  console.log(`Flash deck backend running on http://localhost:${settings.port}`);
  console.log(`   Health:    http://localhost:${settings.port}/health`);
  console.log(`   Snapshots: ${settings.dataDir}`);
  console.log(`   Template:  ${settings.templatePath}`);
});

export default app;
