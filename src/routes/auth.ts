import { Router } from 'express';
import { toProfile } from '../db/models/User.js';
import { sendError } from '../errors.js';
import { issueToken, revokeToken } from '../services/tokens.js';
import { currentUser, requirePassword, requireToken, type AuthRequest } from '../middleware/auth.js';
import type { AppContext } from '../types/context.js';

export default function authRoutes(ctx: AppContext): Router {
  const router = Router();

  // GET /login — exchange Basic credentials for a bearer token
  router.get('/login', requirePassword(ctx), async (req: AuthRequest, res) => {
    try {
      const user = currentUser(req);
      const token = await issueToken(ctx.store, user, ctx.tokenLifetimeSeconds);
      res.json({
        token,
        token_exp: user.token_exp?.toISOString() ?? null,
        ...toProfile(user),
      });
    } catch (error) {
      sendError(res, error, 'Login');
    }
  });

  // POST /logout — expire the caller's token
  router.post('/logout', requireToken(ctx), async (req: AuthRequest, res) => {
    try {
      await revokeToken(ctx.store, currentUser(req));
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'Logout');
    }
  });

  // GET /me
  router.get('/me', requireToken(ctx), (req: AuthRequest, res) => {
    try {
      res.json(toProfile(currentUser(req)));
    } catch (error) {
      sendError(res, error, 'Load profile');
    }
  });

  return router;
}
