import express, { type ErrorRequestHandler, type Router } from "express";

/** Mounts one router behind the JSON body parser, plus optional error handlers. */
export function createRouteTestApp(
    basePath: string,
    router: Router,
    ...errorHandlers: ErrorRequestHandler[]
) {
    const app = express();
    app.use(express.json());
    app.use(basePath, router);
    errorHandlers.forEach((handler) => app.use(handler));
    return app;
}
