import express from 'express';
import auth from './auth';
import controller, { Services } from './controller';
import { tagged } from '../logger';
import {
    NotFoundError,
    OperationInProgress,
    PackageManagerError,
    UnresolvableConflict,
    ValidationError,
} from '../errors';

const log = tagged('http');

const statusOf = (err: unknown): number => {
    if (err instanceof ValidationError || err instanceof SyntaxError) {
        return 400;
    }
    if (err instanceof NotFoundError) {
        return 404;
    }
    if (err instanceof OperationInProgress || err instanceof UnresolvableConflict) {
        return 409;
    }
    return 500;
};

const errorHandler: express.ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
        next(err);
        return;
    }
    const status = statusOf(err);
    const message = err instanceof Error ? err.message : String(err);
    if (status === 500) {
        log.error(`${req.method} ${req.path}: ${message}`);
    }
    res.status(status).json({
        msg: `Error Occurred. Reason: ${message}`,
        code: err instanceof PackageManagerError ? err.code : 'internal',
    });
};

const createApp = (services: Services, token?: string): express.Express => {
    const routes = controller(services);
    const app = express();
    app.use(express.json());
    app.use(auth(token));

    app.get('/packages', routes.searchPackages);
    app.post('/packages/discover', routes.discover);
    app.get('/packages/:name', routes.getPackage);
    app.get('/packages/:name/tree', routes.getTree);
    app.get('/updates', routes.getUpdates);
    app.get('/repositories', routes.getRepositories);
    app.get('/cache', routes.getCache);
    app.post('/cache/:source/refresh', routes.refreshCache);
    app.delete('/cache/:source', routes.invalidateCache);
    app.get('/operations', routes.listOperations);
    app.post('/operations', routes.submitOperation);
    app.get('/operations/:id', routes.getOperation);
    app.get('/operations/:id/events', routes.streamEvents);
    app.delete('/operations/:id', routes.cancelOperation);
    app.post('/operations/:id/credential', routes.answerCredential);
    app.get('/credentials', routes.getCredentialRequests);

    app.use(errorHandler);
    return app;
};

export default createApp;
export { statusOf };
