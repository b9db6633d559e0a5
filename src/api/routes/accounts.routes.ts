import express, { Router } from 'express';
import * as accountsController from '@/controllers/accounts.controller';
import { requireContentType } from '@/middlewares/contentType';
import { methodNotAllowed } from '@/middlewares/methodNotAllowed';

const router = Router();

const jsonBody = express.json({ limit: '10kb' });

/**
 * GET  /accounts - list all accounts
 * POST /accounts - create an account (Content-Type must be application/json)
 */
router
  .route('/')
  .get(accountsController.listAccounts)
  .post(requireContentType('application/json'), jsonBody, accountsController.createAccount)
  .all(methodNotAllowed(['GET', 'POST']));

/**
 * GET    /accounts/:accountId - read an account
 * PUT    /accounts/:accountId - update an account
 * DELETE /accounts/:accountId - delete an account
 *
 * Only digit runs match, so /accounts/abc falls through to the 404 handler
 */
router
  .route('/:accountId(\\d+)')
  .get(accountsController.getAccount)
  .put(jsonBody, accountsController.updateAccount)
  .delete(accountsController.deleteAccount)
  .all(methodNotAllowed(['GET', 'PUT', 'DELETE']));

export default router;
