/**
 * Authentication Service - operator login and bearer tokens
 */

import { FastifyInstance } from 'fastify';
import { hash, compare } from 'bcrypt';
import { LoginRequest, LoginResponse, ServiceError, ServiceErrorCode } from '@creditops/types';

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: { sub: string };
    user: { sub: string };
  }
}

const SALT_ROUNDS = 10;

export interface OperatorAccount {
  username: string;
  password: string;
  tokenTtlSeconds: number;
}

export class AuthService {
  private constructor(
    private readonly fastify: FastifyInstance,
    private readonly username: string,
    private readonly passwordHash: string,
    private readonly tokenTtlSeconds: number
  ) {}

  /**
   * Requires @fastify/jwt to be registered on the instance
   */
  static async create(fastify: FastifyInstance, account: OperatorAccount): Promise<AuthService> {
    const passwordHash = await hash(account.password, SALT_ROUNDS);
    return new AuthService(fastify, account.username, passwordHash, account.tokenTtlSeconds);
  }

  async login(request: LoginRequest): Promise<LoginResponse> {
    // Compared for unknown usernames too
    const passwordMatches = await compare(request.password, this.passwordHash);
    if (request.username !== this.username || !passwordMatches) {
      throw new ServiceError(ServiceErrorCode.AUTH_REJECTED, 'Invalid username or password');
    }

    const accessToken = this.fastify.jwt.sign(
      { sub: request.username },
      { expiresIn: `${this.tokenTtlSeconds}s` }
    );

    return {
      accessToken,
      tokenType: 'Bearer',
      expiresIn: this.tokenTtlSeconds,
    };
  }
}
