import { readFileSync } from "node:fs";

import { Router } from "express";

const OPENAPI_DOCUMENT_PATH = new URL("../../../openapi/openapi.json", import.meta.url);
const OPENAPI_ROUTE = "/openapi.json";

export const loadOpenApiDocument = (): unknown => {
  return JSON.parse(readFileSync(OPENAPI_DOCUMENT_PATH, "utf8"));
};

const renderSwaggerUi = (title: string): string => `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>${title} - Swagger UI</title>
    <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/swagger-ui-dist@5/swagger-ui.css" />
  </head>
  <body>
    <div id="swagger-ui"></div>
    <script src="https://cdn.jsdelivr.net/npm/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
    <script>
      window.ui = SwaggerUIBundle({ url: "${OPENAPI_ROUTE}", dom_id: "#swagger-ui" });
    </script>
  </body>
</html>
`;

const renderRedoc = (title: string): string => `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>${title} - ReDoc</title>
  </head>
  <body>
    <redoc spec-url="${OPENAPI_ROUTE}"></redoc>
    <script src="https://cdn.jsdelivr.net/npm/redoc@2/bundles/redoc.standalone.js"></script>
  </body>
</html>
`;

export const createDocsRouter = (openApiDocument: unknown, title: string): Router => {
  const docsRouter = Router();

  docsRouter.get(OPENAPI_ROUTE, (_req, res) => {
    res.json(openApiDocument);
  });

  docsRouter.get("/docs", (_req, res) => {
    res.type("html").send(renderSwaggerUi(title));
  });

  docsRouter.get("/redoc", (_req, res) => {
    res.type("html").send(renderRedoc(title));
  });

  return docsRouter;
};
