import express, { Router } from 'express';
import { BookInput } from '../db/models/Book.js';
import { NotFoundError, sendError } from '../errors.js';
import { requireToken, requireAdmin, type AuthRequest } from '../middleware/auth.js';
import type { AppContext } from '../types/context.js';
import { parseBody, parseId } from './validation.js';

export default function bookRoutes(ctx: AppContext): Router {
  const router = Router();
  const authenticated = requireToken(ctx);
  // Bodies are parsed only once the caller is known to be an admin
  const json = express.json();

  // GET /book — list all books
  router.get('/', authenticated, async (_req: AuthRequest, res) => {
    try {
      res.json({ books: await ctx.store.listBooks() });
    } catch (error) {
      sendError(res, error, 'List books');
    }
  });

  // GET /book/:id
  router.get('/:id', authenticated, async (req: AuthRequest, res) => {
    try {
      const book = await ctx.store.findBook(parseId(req.params.id, 'Book'));
      if (!book) {
        throw new NotFoundError('Book not found');
      }
      res.json(book);
    } catch (error) {
      sendError(res, error, 'Get book');
    }
  });

  // POST /book
  router.post('/', authenticated, requireAdmin, json, async (req: AuthRequest, res) => {
    try {
      const book = await ctx.store.createBook(parseBody(BookInput, req.body));
      res.json({ message: `Book ${book.title} was created with id ${book.id}`, book });
    } catch (error) {
      sendError(res, error, 'Create book');
    }
  });

  // PUT /book/:id — overwrite all fields
  router.put('/:id', authenticated, requireAdmin, json, async (req: AuthRequest, res) => {
    try {
      const id = parseId(req.params.id, 'Book');
      if (!(await ctx.store.findBook(id))) {
        throw new NotFoundError('Book not found');
      }

      const book = await ctx.store.updateBook(id, parseBody(BookInput, req.body));
      if (!book) {
        throw new NotFoundError('Book not found');
      }
      res.json({ message: `Book ${book.title} with id ${book.id} has been updated`, book });
    } catch (error) {
      sendError(res, error, 'Update book');
    }
  });

  // DELETE /book/:id
  router.delete('/:id', authenticated, requireAdmin, async (req: AuthRequest, res) => {
    try {
      const id = parseId(req.params.id, 'Book');
      if (!(await ctx.store.deleteBook(id))) {
        throw new NotFoundError('Book not found');
      }
      res.json({ message: `Book with id ${id} has been removed` });
    } catch (error) {
      sendError(res, error, 'Delete book');
    }
  });

  return router;
}
