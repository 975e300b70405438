/**
 * Identity of whoever issued the current request.
 * Built from bearer-token claims by attachCallerContext.
 */

export type PortalRole = 'student' | 'cr' | 'faculty' | 'authority' | 'moderator';

export interface AnonymousCaller {
	authenticated: false;
}

export interface AuthenticatedCaller {
	authenticated: true;
	userId: string;
	email?: string;
	role: PortalRole;
	isStaff: boolean;
	isSuperuser: boolean;
}

export type Caller = AnonymousCaller | AuthenticatedCaller;

export const ANONYMOUS_CALLER: AnonymousCaller = { authenticated: false };
