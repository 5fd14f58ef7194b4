export type Env = {
  CF_API_URL: string;
  CF_ACCESS_TOKEN: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const CF_API_URL = validateHttpUrl("CF_API_URL", env.CF_API_URL?.trim() || "http://localhost:8080");
  const CF_ACCESS_TOKEN = env.CF_ACCESS_TOKEN?.trim() ?? "";

  return { CF_API_URL, CF_ACCESS_TOKEN };
};
