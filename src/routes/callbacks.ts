import express from 'express';
import logger from '../utils/logger';
import { SIGNATURE_HEADER, isValidSignature } from '../utils/signature';
import { TaskSnapshot, taskSnapshotSchema } from '../types';
import { parseJson } from '../services/classifier';

export type CallbackHandler = (snapshot: TaskSnapshot) => void | Promise<void>;

export interface CallbackRouterOptions {
  /** Receives every valid callback. Without one, callbacks are acknowledged and dropped. */
  handler?: CallbackHandler;
  /** Shared secret for `X-Kling-Signature`; verification is skipped when unset. */
  secret?: string;
  now?: () => number;
}

export interface CallbackReply {
  statusCode: number;
  body: Record<string, unknown>;
}

export interface IncomingCallback {
  rawBody: Buffer;
  signature?: string;
}

function securityError(message: string): CallbackReply {
  return {
    statusCode: 403,
    body: { status: 'error', error: 'CallbackSecurityError', message }
  };
}

function validationError(validationErrors: Array<{ path: string; message: string; code: string }>): CallbackReply {
  return {
    statusCode: 422,
    body: {
      status: 'error',
      error: 'validation_error',
      message: 'Invalid callback data',
      details: { validation_errors: validationErrors }
    }
  };
}

export async function processCallback(incoming: IncomingCallback, options: CallbackRouterOptions = {}): Promise<CallbackReply> {
  const now = options.now ?? Date.now;

  if (options.secret) {
    if (!incoming.signature) {
      return securityError('Missing signature header');
    }
    if (!isValidSignature(incoming.rawBody, incoming.signature, options.secret)) {
      return securityError('Invalid signature');
    }
  }

  const parsedJson = parseJson(incoming.rawBody.toString('utf8'));
  if (!parsedJson.ok) {
    return validationError([{ path: '', message: 'Body is not valid JSON', code: 'invalid_json' }]);
  }

  const decoded = taskSnapshotSchema.safeParse(parsedJson.value);
  if (!decoded.success) {
    logger.warn('Rejected invalid callback', { issues: decoded.error.issues.length });
    return validationError(
      decoded.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message, code: issue.code }))
    );
  }

  const snapshot = decoded.data;

  if (options.handler) {
    try {
      await options.handler(snapshot);
    } catch (error) {
      logger.error('Callback handler failed', {
        taskId: snapshot.taskId,
        error: error instanceof Error ? error.message : String(error)
      });
      return {
        statusCode: 500,
        body: {
          status: 'error',
          error: error instanceof Error ? error.constructor.name : 'Error',
          message: error instanceof Error ? error.message : String(error)
        }
      };
    }
  } else {
    logger.debug('No callback handler registered, dropping callback', { taskId: snapshot.taskId });
  }

  logger.info('Callback accepted', { taskId: snapshot.taskId, status: snapshot.status });

  return {
    statusCode: 202,
    body: {
      status: 'success',
      message: 'Callback received',
      task_id: snapshot.taskId,
      received_at: now()
    }
  };
}

export function createCallbackRouter(options: CallbackRouterOptions = {}): express.Router {
  const router = express.Router();

  // The raw body is kept for signature checks; JSON decoding happens in processCallback
  router.post('/kling', express.raw({ type: () => true, limit: '10mb' }), async (req, res, next) => {
    try {
      const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const reply = await processCallback({ rawBody, signature: req.get(SIGNATURE_HEADER) }, options);
      res.status(reply.statusCode).json(reply.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
