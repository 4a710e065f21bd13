/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Extracts raw attributes per channel:
 *   - params: JSON body (POST /auth/sign-in)
 *   - http:   Authorization: Basic header (GET /auth/me)
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Token request endpoints answer 200 with the same message whatever happened.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { signInSchema, tokenRequestSchema } from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import type { AuthService } from './auth.service';
import { AuthErrors } from './auth.errors';
import { BASIC_AUTH_REALM, TOKEN_REQUEST_RESPONSES } from './auth.constants';
import type { AuthResult, IdentityTokenPurpose } from './auth.types';
import { parseBasicAuth } from './helpers/parse-basic-auth';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  private attachIdentity(req: FastifyRequest, result: AuthResult) {
    req.requestContext.identityId = result.identity.id;
  }

  async signIn(req: FastifyRequest, reply: FastifyReply) {
    const parsed = signInSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { password, ...attributes } = parsed.data;

    const result = await this.authService.signIn({
      channel: 'params',
      attributes,
      password,
      requestId: req.requestContext.requestId,
    });

    this.attachIdentity(req, result);
    return reply.status(200).send(result);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const credentials = parseBasicAuth(req.headers.authorization);
    const key = this.authService.primaryAuthenticationKey;

    if (!credentials || !key) {
      reply.header('www-authenticate', `Basic realm="${BASIC_AUTH_REALM}"`);
      throw AuthErrors.missingBasicCredentials();
    }

    const result = await this.authService.signIn({
      channel: 'http',
      attributes: { [key]: credentials.login },
      password: credentials.password,
      requestId: req.requestContext.requestId,
    });

    this.attachIdentity(req, result);
    return reply.status(200).send(result);
  }

  private async requestToken(
    purpose: IdentityTokenPurpose,
    req: FastifyRequest,
    reply: FastifyReply,
  ) {
    const parsed = tokenRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    await this.authService.requestToken({
      purpose,
      attributes: parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(TOKEN_REQUEST_RESPONSES[purpose]);
  }

  async requestPasswordReset(req: FastifyRequest, reply: FastifyReply) {
    return this.requestToken('reset_password', req, reply);
  }

  async requestConfirmation(req: FastifyRequest, reply: FastifyReply) {
    return this.requestToken('confirmation', req, reply);
  }
}
