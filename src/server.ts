import { createApp } from "./app";
import { INTAKE_SYSTEM_PROMPT } from "./ai/system/intake.system";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, runtime } = createApp(env);

  app.listen(env.port, async () => {
    logger.info("Server started", { port: env.port });
    logger.info(`LLM model: ${env.llm.model}`, {
      endpoint: env.llm.endpoint,
      deploymentMode: env.llm.deploymentMode,
    });
    logger.info("LLM system prompt loaded", { length: INTAKE_SYSTEM_PROMPT.length });

    const status = await runtime.llmClient.checkStatus();
    if (!status.connected) {
      logger.warn("LLM endpoint is not reachable, questions will use fallbacks", {
        endpoint: status.endpoint,
      });
      return;
    }
    if (!status.modelAvailable) {
      logger.warn("LLM model is not available on the endpoint", { model: status.model });
    }
  });
}

void bootstrap();
