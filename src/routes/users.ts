import express, { Router } from 'express';
import { toProfile, UserInput } from '../db/models/User.js';
import { NotFoundError, sendError } from '../errors.js';
import { hashPassword } from '../services/passwords.js';
import { requireToken, requireAdmin, type AuthRequest } from '../middleware/auth.js';
import type { AppContext } from '../types/context.js';
import { parseBody, parseId } from './validation.js';

export default function userRoutes(ctx: AppContext): Router {
  const router = Router();
  const authenticated = requireToken(ctx);
  // Bodies are parsed only once the caller is known to be an admin
  const json = express.json();

  // POST /user and /user/:id — register a user; the id is assigned by the store
  router.post(['/', '/:id'], authenticated, requireAdmin, json, async (req: AuthRequest, res) => {
    try {
      if (req.params.id !== undefined) {
        parseId(req.params.id, 'User');
      }
      const input = parseBody(UserInput, req.body);
      const user = await ctx.store.createUser({
        first_name: input.first_name,
        last_name: input.last_name,
        email: input.email,
        password_hash: await hashPassword(input.password, ctx.passwordRounds),
        is_admin: input.is_admin ?? false,
      });

      res.json({
        message: `User ${user.first_name} ${user.last_name} has been created with id: ${user.id}`,
        user: toProfile(user),
      });
    } catch (error) {
      sendError(res, error, 'Create user');
    }
  });

  // PUT /user/:id — overwrite profile fields and password
  router.put('/:id', authenticated, requireAdmin, json, async (req: AuthRequest, res) => {
    try {
      const id = parseId(req.params.id, 'User');
      if (!(await ctx.store.findUserById(id))) {
        throw new NotFoundError('User not found');
      }

      const input = parseBody(UserInput, req.body);
      const user = await ctx.store.updateUser(id, {
        first_name: input.first_name,
        last_name: input.last_name,
        email: input.email,
        password_hash: await hashPassword(input.password, ctx.passwordRounds),
        is_admin: input.is_admin,
      });
      if (!user) {
        throw new NotFoundError('User not found');
      }

      res.json({ message: `User ${user.id} has been updated`, user: toProfile(user) });
    } catch (error) {
      sendError(res, error, 'Update user');
    }
  });

  // DELETE /user/:id
  router.delete('/:id', authenticated, requireAdmin, async (req: AuthRequest, res) => {
    try {
      const id = parseId(req.params.id, 'User');
      if (!(await ctx.store.deleteUser(id))) {
        throw new NotFoundError('User not found');
      }
      res.json({ message: `User with id ${id} has been deleted` });
    } catch (error) {
      sendError(res, error, 'Delete user');
    }
  });

  return router;
}
