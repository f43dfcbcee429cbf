import bcrypt from 'bcryptjs';
import { errors as joseErrors, jwtVerify, SignJWT } from 'jose';
import { User, UserProfile, toUserProfile } from '../models/user';
import { AuthError, ValidationError } from '../errors';
import { Identity, TokenResponse } from '../types';
import type { IUserStore } from './userService';

export interface AuthSettings {
  jwtSecret: string;
  tokenTtlMinutes: number;
  bcryptRounds: number;
}

export interface RegistrationInput {
  email: string;
  password: string;
  user_name?: string | null;
}

const ALGORITHM = 'HS256';

export class AuthService {
  private readonly key: Uint8Array;

  constructor(
    private readonly users: IUserStore,
    private readonly settings: AuthSettings
  ) {
    this.key = new TextEncoder().encode(settings.jwtSecret);
  }

  async register(input: RegistrationInput): Promise<UserProfile> {
    const email = input.email.trim().toLowerCase();
    const existing = await this.users.findByEmail(email);
    if (existing) {
      throw new ValidationError('Email already registered');
    }

    const hashed = await bcrypt.hash(input.password, this.settings.bcryptRounds);
    const user = await this.users.createUser(email, hashed, input.user_name ?? null);
    console.log(`[AuthService] Registered user #${user.id}`);
    return toUserProfile(user);
  }

  /**
   * Exchange a verified email and password for a signed, time-bounded token.
   */
  async login(email: string, password: string): Promise<TokenResponse> {
    const user = await this.users.findByEmail(email.trim().toLowerCase());
    const valid = user ? await bcrypt.compare(password, user.hashed_password) : false;
    if (!user || !valid) {
      throw new AuthError('InvalidCredentials', 'Incorrect email or password');
    }

    return {
      access_token: await this.issueToken(user),
      token_type: 'bearer',
      user_id: user.id,
    };
  }

  async issueToken(user: Pick<User, 'email'>): Promise<string> {
    const issuedAt = Math.floor(Date.now() / 1000);
    return new SignJWT({})
      .setProtectedHeader({ alg: ALGORITHM })
      .setSubject(user.email)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + this.settings.tokenTtlMinutes * 60)
      .sign(this.key);
  }

  /**
   * Resolve a bearer token to the identity of a stored user. Read-only.
   */
  async authenticate(token: string | undefined): Promise<Identity> {
    if (!token) {
      throw new AuthError('MissingToken', 'Not authenticated');
    }

    let subject: string | undefined;
    try {
      const { payload } = await jwtVerify(token, this.key, { algorithms: [ALGORITHM] });
      subject = payload.sub;
    } catch (error) {
      if (error instanceof joseErrors.JWTExpired) {
        throw new AuthError('ExpiredToken', 'Token has expired');
      }
      throw new AuthError('MalformedToken');
    }

    if (!subject) {
      throw new AuthError('MalformedToken');
    }

    const user = await this.users.findByEmail(subject);
    if (!user) {
      throw new AuthError('UnknownSubject');
    }

    return { id: user.id, email: user.email, user_name: user.user_name };
  }

  async getProfile(identity: Identity): Promise<UserProfile> {
    const user = await this.users.findById(identity.id);
    if (!user) {
      throw new AuthError('UnknownSubject');
    }
    return toUserProfile(user);
  }

  async deleteAccount(identity: Identity): Promise<void> {
    await this.users.deleteUser(identity.id);
    console.log(`[AuthService] Deleted account #${identity.id}`);
  }
}
