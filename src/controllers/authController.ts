import { Request, Response, NextFunction } from 'express';
import { UserService } from '../services/user/UserService.js';
import { AuthTokenService } from '../services/user/AuthTokenService.js';
import { getAuthenticatedUser } from '../middleware/auth.js';
import { parseInput } from '../middleware/validation.js';
import { loginSchema, registerSchema, updateAccountSchema } from '../validation/authSchemas.js';
import { AuthenticationError } from '../errors/index.js';
import { logger } from '../middleware/logging.js';

export class AuthController {
  constructor(
    private userService: UserService,
    private tokenService: AuthTokenService
  ) {}

  /**
   * POST /api/auth/register
   */
  async register(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input = parseInput(registerSchema, req.body);
      const user = await this.userService.registerUser(input);
      const { token, expiresAt } = await this.tokenService.issueToken(user);

      res.status(201).json({ user, token, expiresAt });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/auth/login
   */
  async login(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { login, password } = parseInput(loginSchema, req.body);
      const user = await this.userService.authenticateUser(login, password);
      if (!user) {
        throw new AuthenticationError('Invalid credentials', {
          service: 'AuthController',
          operation: 'login',
        });
      }

      const { token, expiresAt } = await this.tokenService.issueToken(user);
      logger.info('User logged in', { userId: user.id });
      res.json({ user, token, expiresAt });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/auth/logout - revokes only the token used for this request
   */
  async logout(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (req.authToken) {
        await this.tokenService.revokeToken(req.authToken);
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }

  async getMe(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json({ user: getAuthenticatedUser(req) });
    } catch (error) {
      next(error);
    }
  }

  async updateMe(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const changes = parseInput(updateAccountSchema, req.body);
      const user = await this.userService.updateUserProfile(getAuthenticatedUser(req), changes);
      res.json({ user });
    } catch (error) {
      next(error);
    }
  }

  async enable2fa(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = await this.userService.enable2fa(getAuthenticatedUser(req));
      res.json({ user });
    } catch (error) {
      next(error);
    }
  }

  async disable2fa(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = await this.userService.disable2fa(getAuthenticatedUser(req));
      res.json({ user });
    } catch (error) {
      next(error);
    }
  }
}
