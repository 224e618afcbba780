declare global {
    namespace Express {
        interface Request {
            /** Correlation id set by the requestContext middleware */
            id?: string;
        }
    }
}

export {};
