import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AdminTokenGuard } from './admin-token.guard';

function contextWith(authorization?: string): ExecutionContext {
  const request = { headers: { authorization } };
  return {
    switchToHttp: () => ({ getRequest: () => request }),
  } as never;
}

describe('AdminTokenGuard', () => {
  const guard = new AdminTokenGuard();
  const originalToken = process.env.ADMIN_TOKEN;

  afterEach(() => {
    if (originalToken == null) {
      delete process.env.ADMIN_TOKEN;
    } else {
      process.env.ADMIN_TOKEN = originalToken;
    }
  });

  it('lets requests through when no token is configured', () => {
    delete process.env.ADMIN_TOKEN;

    expect(guard.canActivate(contextWith())).toBe(true);
  });

  it('accepts the configured bearer token', () => {
    process.env.ADMIN_TOKEN = 'test-secret';

    expect(guard.canActivate(contextWith('Bearer test-secret'))).toBe(true);
    expect(guard.canActivate(contextWith('bearer   test-secret '))).toBe(true);
  });

  it('rejects a missing or wrong token', () => {
    process.env.ADMIN_TOKEN = 'test-secret';

    expect(() => guard.canActivate(contextWith())).toThrow(
      UnauthorizedException,
    );
    expect(() => guard.canActivate(contextWith('Bearer nope'))).toThrow(
      UnauthorizedException,
    );
  });
});
