import { readFileSync } from 'node:fs';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { Express } from 'express';

// Resolves to the repository root from both src/ and dist/.
const specPath = new URL('../../../src/api/openapi/spec.yaml', import.meta.url);

let cached: Record<string, unknown> | undefined;

export function loadOpenApiDocument(): Record<string, unknown> {
  if (cached === undefined) {
    const parsed: Record<string, unknown> = YAML.parse(readFileSync(specPath, 'utf-8'));
    cached = parsed;
  }
  return cached;
}

export function setupOpenAPI(app: Express): void {
  const document = loadOpenApiDocument();

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(document, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Provider Validation API',
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(document);
  });
}
