import type { NextFunction, Request, Response, Router } from "express";
import { articleIdSchema } from "@readright/shared";
import { NotFoundError, ValidationError } from "../errors.js";
import { processArticle } from "../pipeline/processArticle.js";
import { resolveInput } from "../pipeline/resolveInput.js";
import type { Services } from "../services.js";

export function mountArticleRoutes(router: Router, services: Services): void {
  router.post("/articles", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const source = resolveInput(req.body);
      const result = await processArticle(source, services);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get("/articles/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = articleIdSchema.safeParse(req.params.id);
      if (!id.success) {
        throw new ValidationError(`Invalid article id: ${req.params.id}`);
      }
      const article = await services.store.find(id.data);
      if (!article) {
        throw new NotFoundError(`Article ${id.data} not found`);
      }
      res.json(article);
    } catch (error) {
      next(error);
    }
  });
}
