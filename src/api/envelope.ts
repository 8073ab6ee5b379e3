import Ajv, { SchemaObject } from 'ajv';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ErrorCode, Failure, failure } from '../errors';

/** Every /api response; success and error are mutually exclusive */
export type ApiResponse =
  | { success: true; message: string; data: unknown }
  | { success: false; message: string; error_code: ErrorCode; data?: unknown };

const STATUS_BY_CODE: Readonly<Record<ErrorCode, number>> = {
  VALIDATION_ERROR: 400,
  UNKNOWN_TASK_TYPE: 400,
  UNAVAILABLE: 409,
  DUPLICATE_TASK: 409,
  CREATE_FAILED: 500,
  QUEUE_PUBLISH_FAILED: 503,
  SESSION_NOT_FOUND: 404,
  TASK_NOT_FOUND: 404,
  TRANSFER_NOT_FOUND: 404,
  DISPATCH_UNAVAILABLE: 502,
  COMPLETE_FAILED: 404,
  NO_TASK: 200,
  FORBIDDEN: 403,
  INTERNAL_ERROR: 500,
};

export function sendOk(reply: FastifyReply, message: string, data: unknown): FastifyReply {
  const body: ApiResponse = { success: true, message, data };
  return reply.status(200).send(body);
}

export function sendFailure(
  reply: FastifyReply,
  result: Pick<Failure, 'errorCode' | 'errorMessage'>,
  data?: unknown,
): FastifyReply {
  const body: ApiResponse = { success: false, message: result.errorMessage, error_code: result.errorCode };
  if (data !== undefined) body.data = data;
  return reply.status(STATUS_BY_CODE[result.errorCode]).send(body);
}

const ajv = new Ajv({ allErrors: true, coerceTypes: true });

/** Compile a JSON schema once; the returned function narrows the input or explains why it cannot */
export function bodyValidator<T>(schema: SchemaObject) {
  const validate = ajv.compile<T>(schema);
  return (input: unknown): { value: T } | { error: Failure } => {
    if (validate(input)) return { value: input };
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
    return { error: failure('VALIDATION_ERROR', `Invalid input: ${errors}`) };
  };
}

/** Reject requests without the configured admin key. No key configured = open. */
export function verifyAdmin(apiKey: string) {
  return async (req: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    if (!apiKey) return undefined;
    const key = req.headers['x-admin-api-key'];
    if (key !== apiKey) {
      return sendFailure(reply, { errorCode: 'FORBIDDEN', errorMessage: 'Forbidden' });
    }
    return undefined;
  };
}
