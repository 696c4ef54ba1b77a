import { z } from 'zod';

export interface SessionContext {
    sessionId: string;
}

const SessionSchema = z.object({
    sessionId: z.string().optional().default('default')
});

// Create wrapper for tool handlers
export function withSession<T extends z.ZodTypeAny, R>(
    schema: T,
    handler: (args: z.output<T>, ctx: SessionContext) => Promise<R>
): (args: unknown) => Promise<R> {
    return async (args: unknown) => {
        const parsed = schema.parse(args);
        const { sessionId } = SessionSchema.parse(args);
        return handler(parsed, { sessionId });
    };
}
