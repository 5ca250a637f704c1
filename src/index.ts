import { loadConfig, logCfg } from "./config.js";
import { createApp } from "./app.js";

const cfg = loadConfig(process.env);
logCfg(cfg);

const app = createApp(cfg);
app.listen(cfg.port, () => console.log(`[srv] listening on :${cfg.port}`));
