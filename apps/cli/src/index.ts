import process from "node:process";

import { CompletionClient } from "@region-complete/completion-core";

import { createCliApplication } from "./cliApplication.js";
import { CommandRouter } from "./commandRouter.js";
import { createConfigCommandDescriptor } from "./commands/configCommand.js";
import { createTaskCommandDescriptors } from "./commands/taskCommands.js";
import { ConfigService } from "./config/configService.js";
import { resolveConfigFilePath } from "./config/configPaths.js";
import { ConfigStore } from "./config/configStore.js";
import { EnvCredentialSource } from "./config/credentialSource.js";
import { InputResolver } from "./inputResolver.js";
import { createNodeProcessIO } from "./processIo.js";

async function main(): Promise<void> {
  const configFilePath = resolveConfigFilePath();
  const configStore = new ConfigStore(configFilePath);
  const configService = new ConfigService(configStore, new EnvCredentialSource());

  const router = new CommandRouter();
  for (const descriptor of createTaskCommandDescriptors({
    inputResolver: new InputResolver(),
    profiles: configService,
    clientFactory: (endpoint) =>
      new CompletionClient(endpoint, {
        onContinuationError: (error) => {
          const message = error instanceof Error ? error.message : String(error);
          process.stderr.write(`Completion handler failed: ${message}\n`);
        },
      }),
  })) {
    router.register(descriptor);
  }
  router.register(
    createConfigCommandDescriptor({
      configService,
    })
  );

  const app = createCliApplication({
    name: "region-complete",
    description: "Send text regions to a completion endpoint and route the results",
    router,
    loadAuditLogSettings: async () => {
      await configService.initialize();
      return configService.getLogSettings();
    },
  });

  const io = createNodeProcessIO(process);
  const exitCode = await app.run(process.argv, io);

  if (typeof process.exitCode !== "number") {
    process.exitCode = exitCode;
  }
}

void main();
