import type { FastifyInstance } from "fastify";
import { config } from "../config/index.js";
import { logError, logInfo, logWarn, serializeError } from "../observability/logger.js";
import { getOpenAIClient, shutdownOpenAIClient, type OpenAISingleton } from "./openai.js";

let processHooksRegistered = false;

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  getOpenAIClient?: () => Promise<Pick<OpenAISingleton, "healthCheck">>;
  shutdownOpenAIClient?: () => Promise<void>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => void;
}

/**
 * Warms and health-checks the OpenAI client when the app becomes ready, and
 * releases it on close or on SIGINT/SIGTERM. A failing health check is logged
 * but does not stop the server; generation requests report provider errors on
 * their own.
 */
export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? config.ENABLE_INFRA_BOOTSTRAP;
  if (!enableBootstrap) {
    logInfo("clients.bootstrap.disabled", {}, { hint: "set ENABLE_INFRA_BOOTSTRAP=true to enable" });
    return;
  }
  const getClient = options?.getOpenAIClient ?? getOpenAIClient;
  const shutdownClient = options?.shutdownOpenAIClient ?? shutdownOpenAIClient;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const client = await getClient();
    const health = await client.healthCheck();
    if (health.status === "ok") {
      logInfo("clients.openai.health", {}, { status: health.status });
    } else {
      logWarn("clients.openai.health", {}, { status: health.status, details: health.details ?? null });
    }
  });

  app.addHook("onClose", async () => {
    await shutdownClient();
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      logInfo("server.signal.received", {}, { signal });
      await app.close();
      exit(0);
    };

    const onSignal = (signal: NodeJS.Signals): void => {
      handleSignal(signal).catch((error: unknown) => {
        logError("server.shutdown.failed", {}, serializeError(error));
        exit(1);
      });
    };

    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
