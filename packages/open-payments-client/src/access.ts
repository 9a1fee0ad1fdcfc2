import { RequestValidationError } from './errors.js';
import { accessRightSchema, describeIssue } from './schemas.js';
import type { AccessAction, AccessLimits, AccessRight, AccessRightType, GrantRequest, GrantRequestBody } from './types.js';

/**
 * Build a frozen AccessRight. Duplicate actions collapse; order of first
 * appearance is kept.
 *
 *   accessRight('quote', ['create', 'read'])
 *   accessRight('outgoing-payment', ['read'], { identifier: 'https://wallet.example/alice' })
 */
export function accessRight(
  type: AccessRightType,
  actions: readonly AccessAction[],
  options: { identifier?: string; limits?: AccessLimits } = {},
): AccessRight {
  const parsed = accessRightSchema.safeParse({
    type,
    actions: [...new Set(actions)],
    identifier: options.identifier,
    limits: options.limits,
  });
  if (!parsed.success) {
    throw new RequestValidationError(`Invalid access right: ${describeIssue(parsed.error)}`, 'accessRights');
  }

  const right: AccessRight = {
    type: parsed.data.type,
    actions: Object.freeze(parsed.data.actions),
    ...(parsed.data.identifier !== undefined && { identifier: parsed.data.identifier }),
    ...(parsed.data.limits !== undefined && { limits: Object.freeze(parsed.data.limits) }),
  };
  return Object.freeze(right);
}

/** Grant request → wire body. Absent optional fields are omitted, not null. */
export function toGrantRequestBody(request: GrantRequest): GrantRequestBody {
  const body: GrantRequestBody = {
    access_token: request.accessRights.map((right) => ({
      type: right.type,
      actions: [...right.actions],
      ...(right.identifier !== undefined && { identifier: right.identifier }),
      ...(right.limits !== undefined && { limits: right.limits }),
    })),
    client: request.clientId,
  };

  if (request.interaction) {
    body.interact = {
      start: ['redirect'],
      finish: {
        method: 'redirect',
        uri: request.interaction.redirectUri,
        nonce: request.interaction.nonce,
      },
    };
  }

  return body;
}
