import { Router } from 'express';
import { Logger } from 'pino';

import { Request, Response, NextFunction } from '@/config/http';
import logger from '@/lib/logger';

/**
 * Classe de base abstraite pour les contrôleurs, fournissant des utilitaires communs.
 * Subclasses declare their routes on `router` in the constructor.
 */
export abstract class BaseRouter {
  // Logger protégé, initialisé directement avec l'instance importée
  protected readonly logger: Logger = logger;

  readonly router: Router = Router();

  /**
   * Exécute une fonction métier asynchrone, répond en JSend succès et délègue
   * les erreurs au gestionnaire global via next().
   *
   * @param statusCode Code HTTP de succès (défaut: 200, 204 pour une réponse vide).
   */
  protected async pipe<T>(
    req: Request,
    res: Response,
    next: NextFunction,
    promiseFn: () => Promise<T>,
    statusCode = 200,
  ): Promise<void> {
    try {
      const result = await promiseFn();
      if (statusCode === 204) {
        res.status(204).send();
        return;
      }
      res.status(statusCode).jsend.success(result ?? null);
    } catch (error) {
      this.logger.debug({ err: error }, `Error during piped execution for ${req.method} ${req.path}`);
      next(error);
    }
  }
}
