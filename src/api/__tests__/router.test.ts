import { describe, it, expect } from 'vitest';
import { Router } from '../router';
import { ConstraintViolationError, NotFoundError, TransactionFailureError } from '../../utils/errors';
import { dispatch } from './helpers/mock-router';

describe('Router', () => {
  it('should return 404 for an unknown route', async () => {
    const router = new Router();

    const { statusCode, body } = await dispatch(router, { url: '/api/v1/nothing' });

    expect(statusCode).toBe(404);
    expect(body).toEqual({ success: false, error: { message: 'Not found', code: 'NOT_FOUND' } });
  });

  it('should pass path params and query to the handler', async () => {
    const router = new Router();
    router.get('/things/:id', async (req, res) => {
      res.json({ params: req.params, query: req.query });
    });

    const { body } = await dispatch(router, { url: '/things/9?tag=a&tag=b&page=2' });

    expect(body).toEqual({ params: { id: '9' }, query: { tag: ['a', 'b'], page: '2' } });
  });

  it('should parse a JSON body for POST', async () => {
    const router = new Router();
    router.post('/echo', async (req, res) => {
      res.json(req.body, 201);
    });

    const { statusCode, body } = await dispatch(router, {
      method: 'POST',
      url: '/echo',
      body: { quantity: 2 }
    });

    expect(statusCode).toBe(201);
    expect(body).toEqual({ quantity: 2 });
  });

  it('should run global middleware before route middleware', async () => {
    const router = new Router();
    const calls: string[] = [];
    router.use(async (_req, _res, next) => {
      calls.push('global');
      await next();
    });
    router.get(
      '/ordered',
      async (_req, res) => {
        calls.push('handler');
        res.json({ ok: true });
      },
      [
        async (_req, _res, next) => {
          calls.push('route');
          await next();
        }
      ]
    );

    await dispatch(router, { url: '/ordered' });

    expect(calls).toEqual(['global', 'route', 'handler']);
  });

  it('should map application errors to their status and code', async () => {
    const router = new Router();
    router.get('/missing', async () => {
      throw new NotFoundError('Order', 3);
    });
    router.get('/duplicate', async () => {
      throw new ConstraintViolationError('Duplicate invoice', 'unique');
    });
    router.get('/rolled-back', async () => {
      throw new TransactionFailureError('Transaction rolled back: disk full', new Error('disk full'));
    });

    const missing = await dispatch(router, { url: '/missing' });
    const duplicate = await dispatch(router, { url: '/duplicate' });
    const rolledBack = await dispatch(router, { url: '/rolled-back' });

    expect(missing.statusCode).toBe(404);
    expect(duplicate).toEqual({
      statusCode: 409,
      body: {
        success: false,
        error: {
          message: 'Duplicate invoice',
          code: 'CONSTRAINT_VIOLATION',
          details: { constraint: 'unique' }
        }
      }
    });
    expect(rolledBack.statusCode).toBe(500);
    expect(rolledBack.body).toMatchObject({ error: { code: 'TRANSACTION_FAILED' } });
  });

  it('should hide unexpected errors behind a generic 500', async () => {
    const router = new Router();
    router.get('/boom', async () => {
      throw new Error('secret detail');
    });

    const { statusCode, body } = await dispatch(router, { url: '/boom' });

    expect(statusCode).toBe(500);
    expect(body).toEqual({
      success: false,
      error: { message: 'Internal server error', code: 'INTERNAL_ERROR' }
    });
  });
});
