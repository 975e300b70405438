import { attachCallerContext, callerFromClaims, requireCaller, requireStaff } from './authMiddleware';
import { AppError } from '../config/errorHandler';
import { signAccessToken } from '../utils/tokenManager';
import { mockRequest, mockResponse, asResponse } from '../testing/http';
import { anonymous, staff, student } from '../testing/callers';

const SECRET = 'test-secret';
const USER_ID = '3f2b8c1e-5d4a-4e6f-9a7b-1c2d3e4f5a6b';

function runMiddleware(
  middleware: typeof attachCallerContext,
  req: ReturnType<typeof mockRequest>
): unknown {
  let forwarded: unknown = 'not called';
  middleware(req, asResponse(mockResponse()), (arg?: unknown) => {
    forwarded = arg;
  });
  return forwarded;
}

describe('attachCallerContext', () => {
  const previousSecret = process.env.JWT_ACCESS_SECRET;

  beforeAll(() => {
    process.env.JWT_ACCESS_SECRET = SECRET;
  });

  afterAll(() => {
    if (previousSecret === undefined) {
      delete process.env.JWT_ACCESS_SECRET;
    } else {
      process.env.JWT_ACCESS_SECRET = previousSecret;
    }
  });

  it('treats a request without a bearer token as anonymous', () => {
    const req = mockRequest();
    expect(runMiddleware(attachCallerContext, req)).toBeUndefined();
    expect(req.caller).toEqual({ authenticated: false });
  });

  it('builds the caller from verified claims', () => {
    const token = signAccessToken({ sub: USER_ID, email: 'asha@example.edu', role: 'moderator', isStaff: true });
    const req = mockRequest({ headers: { authorization: `Bearer ${token}` } });

    expect(runMiddleware(attachCallerContext, req)).toBeUndefined();
    expect(req.caller).toEqual({
      authenticated: true,
      userId: USER_ID,
      email: 'asha@example.edu',
      role: 'moderator',
      isStaff: true,
      isSuperuser: false,
    });
  });

  it('rejects an expired token with TOKEN_EXPIRED', () => {
    const token = signAccessToken({ sub: USER_ID }, { expiresIn: -10 });
    const forwarded = runMiddleware(attachCallerContext, mockRequest({ headers: { authorization: `Bearer ${token}` } }));

    expect(forwarded).toBeInstanceOf(AppError);
    expect(forwarded).toMatchObject({ statusCode: 401, code: 'TOKEN_EXPIRED' });
  });

  it('rejects a token signed with another secret', () => {
    const token = signAccessToken({ sub: USER_ID }, { secret: 'another-secret' });
    const forwarded = runMiddleware(attachCallerContext, mockRequest({ headers: { authorization: `Bearer ${token}` } }));

    expect(forwarded).toMatchObject({ statusCode: 401, code: 'TOKEN_INVALID' });
  });

  it('rejects a token whose subject is not a user id', () => {
    const token = signAccessToken({ sub: 'user-7', isStaff: true });
    const req = mockRequest({ headers: { authorization: `Bearer ${token}` } });

    expect(runMiddleware(attachCallerContext, req)).toMatchObject({ statusCode: 401, code: 'TOKEN_INVALID' });
    expect(req.caller).toBeUndefined();
  });
});

describe('callerFromClaims', () => {
  it('defaults the role and flags', () => {
    expect(callerFromClaims({ sub: USER_ID })).toEqual({
      authenticated: true,
      userId: USER_ID,
      email: undefined,
      role: 'student',
      isStaff: false,
      isSuperuser: false,
    });
  });
});

describe('access guards', () => {
  it('requireStaff answers 401 for anonymous and 403 for students', () => {
    expect(runMiddleware(requireStaff, mockRequest({ caller: anonymous }))).toMatchObject({
      statusCode: 401,
      code: 'UNAUTHENTICATED',
    });
    expect(runMiddleware(requireStaff, mockRequest({ caller: student() }))).toMatchObject({
      statusCode: 403,
      code: 'FORBIDDEN',
    });
    expect(runMiddleware(requireStaff, mockRequest({ caller: staff() }))).toBeUndefined();
  });

  it('requireCaller throws for anonymous callers', () => {
    expect(() => requireCaller(mockRequest())).toThrow('Authentication required');
    expect(requireCaller(mockRequest({ caller: student('s-9') })).userId).toBe('s-9');
  });
});
