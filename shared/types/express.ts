import type { Caller } from './caller';

// Request fields populated by the shared middlewares
declare global {
	namespace Express {
		interface Request {
			correlationId?: string;
			caller?: Caller;
		}
	}
}

export {};
