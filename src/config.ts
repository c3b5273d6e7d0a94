export interface AppConfig {
  api: {
    baseUrl: string;
    apiKey: string;
  };
  people: {
    limit: number | undefined;
  };
  snapshot: {
    path: string;
  };
  http: {
    port: number;
    enabled: boolean;
    apiKey: string;
  };
  logLevel: "info" | "debug";
}

const BREEZE_URL_PATTERN = /^https:\/\/[^/]+\.breezechms\.[^/]+\/?$/;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL ?? "info";
  const baseUrl = env.BREEZE_URL;
  const apiKey = env.BREEZE_API_KEY;

  if (!baseUrl || !apiKey) {
    throw new Error("Missing required env vars: BREEZE_URL, BREEZE_API_KEY");
  }

  if (!BREEZE_URL_PATTERN.test(baseUrl)) {
    throw new Error("BREEZE_URL must look like https://<subdomain>.breezechms.com");
  }

  const httpEnabled = env.HTTP_ENABLED === "true";
  const triggerApiKey = env.TRIGGER_API_KEY ?? "";

  if (httpEnabled && !triggerApiKey) {
    throw new Error("TRIGGER_API_KEY is required when HTTP_ENABLED=true");
  }

  const limit = env.PEOPLE_LIMIT ? Number(env.PEOPLE_LIMIT) : undefined;
  if (limit !== undefined && !(Number.isInteger(limit) && limit > 0)) {
    throw new Error("PEOPLE_LIMIT must be a positive integer");
  }

  const port = Number(env.HTTP_PORT ?? 3001);
  if (!(Number.isInteger(port) && port > 0 && port < 65536)) {
    throw new Error("HTTP_PORT must be an integer between 1 and 65535");
  }

  return {
    api: {
      baseUrl,
      apiKey,
    },
    people: {
      limit,
    },
    snapshot: {
      path: env.SNAPSHOT_PATH ?? "./data/profiles-snapshot.json",
    },
    http: {
      port,
      enabled: httpEnabled,
      apiKey: triggerApiKey,
    },
    logLevel: logLevel === "debug" ? "debug" : "info",
  };
}
