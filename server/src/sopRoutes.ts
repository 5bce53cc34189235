import { Router, type NextFunction, type Request, type Response } from "express";
import { formatPath, type ReviewError } from "./sop/errors";
import { renderSopReport, type RenderOptions } from "./sop/render/renderSopMarkdown";
import { sopSchema } from "./sop/schemaModel";
import { validateSopDocument } from "./sop/validator";

export interface WireReviewError {
  kind: ReviewError["kind"];
  path: string;
  message: string;
}

export function toWireError(error: ReviewError): WireReviewError {
  return { kind: error.kind, path: formatPath(error.path), message: error.message };
}

export function createSopRouter(renderOptions: Partial<RenderOptions> = {}): Router {
  const router = Router();

  // Without a JSON content type the body parser leaves req.body empty.
  router.use((req: Request, res: Response, next: NextFunction) => {
    if (req.method === "POST" && !req.is("application/json")) {
      res.status(415).json({ message: "Content-Type must be application/json" });
      return;
    }
    next();
  });

  /**
   * GET /api/sop/schema
   * The declarative schema, as authored
   */
  router.get("/schema", (_req: Request, res: Response) => {
    res.type("application/json").send(sopSchema.exportText());
  });

  /**
   * POST /api/sop/validate
   * Structural check only; always 200 with the full error list
   */
  router.post("/validate", (req: Request, res: Response) => {
    const result = validateSopDocument(req.body);
    res.json({ valid: result.valid, errors: result.errors.map(toWireError) });
  });

  /**
   * POST /api/sop/render
   * Markdown report for a valid payload, 422 with the error list otherwise
   */
  router.post("/render", (req: Request, res: Response) => {
    const result = validateSopDocument(req.body);
    if (!result.valid) {
      res.status(422).json({ message: "Invalid SOP payload", errors: result.errors.map(toWireError) });
      return;
    }
    res.type("text/markdown").send(renderSopReport(result.document, renderOptions));
  });

  return router;
}
