import "dotenv/config";
import { AzureDevOpsClient } from "./azure/client.js";
import { loadAzureConfig, loadServerConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { WorkItemProxy } from "./proxy/workItemProxy.js";
import { createApp, startServer } from "./server.js";

function buildProxy(): WorkItemProxy | ConfigurationError {
  try {
    const config = loadAzureConfig();
    console.log(`[config] Azure DevOps organization: ${config.organization}`);
    return new WorkItemProxy(new AzureDevOpsClient(config), config);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    // business routes answer 500 with this message
    console.error(`[config] ${err.message}`);
    return err;
  }
}

const app = createApp({ proxy: buildProxy() });
startServer(app, loadServerConfig().port);
