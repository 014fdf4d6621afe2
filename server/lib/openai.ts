import OpenAI from "openai";

const DEFAULT_AZURE_API_VERSION = '2024-02-15-preview';

// Lazy initialization so the module loads even when no credentials are set
let openaiInstance: OpenAI | null = null;

/**
 * Model used for insight generation: the Azure deployment when configured,
 * otherwise OPENAI_MODEL
 */
export const MODELS = {
  generation: process.env.AZURE_OPENAI_DEPLOYMENT_NAME || process.env.OPENAI_MODEL || 'gpt-4o-mini',
} as const;

export function isOpenAIConfigured(): boolean {
  const azure = Boolean(
    process.env.AZURE_OPENAI_API_KEY && process.env.AZURE_OPENAI_ENDPOINT && process.env.AZURE_OPENAI_DEPLOYMENT_NAME
  );
  return azure || Boolean(process.env.OPENAI_API_KEY);
}

/**
 * Azure OpenAI when all AZURE_OPENAI_* variables are present, plain OpenAI
 * when OPENAI_API_KEY is. Throws when neither is configured.
 */
export function getOpenAIClient(): OpenAI {
  if (openaiInstance) {
    return openaiInstance;
  }

  const azureKey = process.env.AZURE_OPENAI_API_KEY;
  const azureEndpoint = process.env.AZURE_OPENAI_ENDPOINT;
  const deployment = process.env.AZURE_OPENAI_DEPLOYMENT_NAME;
  const apiVersion = process.env.AZURE_OPENAI_API_VERSION || DEFAULT_AZURE_API_VERSION;

  if (azureKey && azureEndpoint && deployment) {
    console.log("🔧 Initializing Azure OpenAI...");
    openaiInstance = new OpenAI({
      apiKey: azureKey,
      baseURL: `${azureEndpoint}/openai/deployments/${deployment}`,
      defaultQuery: { 'api-version': apiVersion },
      defaultHeaders: { 'api-key': azureKey },
    });
    console.log(`✅ Azure OpenAI initialized (deployment: ${deployment}, api version: ${apiVersion})`);
    return openaiInstance;
  }

  const apiKey = process.env.OPENAI_API_KEY;
  if (apiKey) {
    console.log("🔧 Initializing OpenAI...");
    openaiInstance = new OpenAI({ apiKey });
    console.log(`✅ OpenAI initialized (model: ${MODELS.generation})`);
    return openaiInstance;
  }

  const errorMsg = 'Missing OpenAI configuration. Set AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_DEPLOYMENT_NAME, or OPENAI_API_KEY.';
  console.error("❌", errorMsg);
  throw new Error(errorMsg);
}
