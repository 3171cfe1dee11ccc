import { type IJSendHelper } from '../common/middleware/JSend';
import { type TokenClaims } from '@/modules/tokens/models/token.types';

import type express from 'express';

declare global {
  namespace Express {
    /**
     * @interface Request
     * @description Interface augmentation for Express.Request to include custom properties.
     */
    interface Request {
      /** Claims of the validated access token, set by `requireAccess`. */
      auth?: TokenClaims;
    }

    /**
     * @interface Response
     * @description Interface augmentation for Express.Response to include custom properties.
     */
    interface Response {
      jsend: IJSendHelper;
    }
  }
}

export type Request = express.Request;
export type Response = express.Response;
export type NextFunction = express.NextFunction;
