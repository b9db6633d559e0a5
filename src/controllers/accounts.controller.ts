import { Request, Response, NextFunction } from 'express';
import { accountService } from '@/config/dependencies';
import { deserializeAccount } from '@/validators/account.validator';
import { serializeAccount } from '@/serializers/account.serializer';
import { resourceLocation } from '@/utils/resourceLocation';

/**
 * Accounts Controller
 * Handles HTTP requests for the /accounts resource
 */

/**
 * Routes only match digit runs for :accountId, so parsing can't yield NaN
 */
function parseAccountId(req: Request): number {
  return Number(req.params.accountId);
}

/**
 * POST /accounts
 * Create an account; Location points at the new resource
 */
export async function createAccount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const input = deserializeAccount(req.body);

    const account = await accountService.createAccount(input);

    const location = resourceLocation(req.protocol, req.get('host'), `${req.baseUrl}/${account.id}`);
    res.status(201).location(location).json(serializeAccount(account));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /accounts
 * List all accounts
 */
export async function listAccounts(
  _req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const accounts = await accountService.listAccounts();

    res.json(accounts.map(serializeAccount));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /accounts/:accountId
 * Read a single account
 */
export async function getAccount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const account = await accountService.getAccount(parseAccountId(req));

    res.json(serializeAccount(account));
  } catch (error) {
    next(error);
  }
}

/**
 * PUT /accounts/:accountId
 * Overwrite an account with the posted data
 */
export async function updateAccount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const accountId = parseAccountId(req);
    await accountService.getAccount(accountId);

    const input = deserializeAccount(req.body);

    const account = await accountService.updateAccount(accountId, input);

    res.json(serializeAccount(account));
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /accounts/:accountId
 * Delete an account; 204 with an empty body
 */
export async function deleteAccount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    await accountService.deleteAccount(parseAccountId(req));

    res.status(204).end();
  } catch (error) {
    next(error);
  }
}
