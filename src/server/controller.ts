import express from 'express';
import { CredentialBroker } from '../core/credentialBroker';
import { DependencyResolver } from '../core/dependencyResolver';
import { MetadataCache } from '../core/metadataCache';
import { Orchestrator } from '../core/orchestrator';
import { QueryEngine } from '../core/queryEngine';
import { NotFoundError, ValidationError } from '../errors';
import { OperationKind, PackageSource } from '../types';
import {
    isRecord,
    parseOperationRequest,
    parseSearchOptions,
    parseSource,
    parseSourceParam,
    queryFlag,
    queryString,
} from './requests';

interface Services {
    cache: MetadataCache;
    query: QueryEngine;
    resolver: DependencyResolver;
    orchestrator: Orchestrator;
    broker: CredentialBroker;
}

type Handler = (req: express.Request, res: express.Response) => Promise<void> | void;

const handle =
    (fn: Handler): express.RequestHandler =>
    (req, res, next) => {
        Promise.resolve()
            .then(() => fn(req, res))
            .catch(next);
    };

const controller = (services: Services) => {
    const { cache, query, resolver, orchestrator, broker } = services;

    const guessSource = (name: string, kind: OperationKind): PackageSource => {
        if (kind === OperationKind.REMOVE) {
            return PackageSource.INSTALLED;
        }
        const merged = cache.get(name);
        if (merged?.aur && !merged.official) {
            return PackageSource.AUR;
        }
        return PackageSource.OFFICIAL;
    };

    const searchPackages = (req: express.Request, res: express.Response): void => {
        const options = parseSearchOptions(req.query);
        const term = queryString(req.query.q) ?? '';
        res.status(200).json(Array.from(query.search(term, options)));
    };

    const getPackage = (req: express.Request, res: express.Response): void => {
        const source = parseSource(queryString(req.query.source));
        const record = query.details(req.params.name, source);
        if (!record) {
            throw new NotFoundError(`Package ${req.params.name} not found`);
        }
        res.status(200).json(record);
    };

    const getTree = async (req: express.Request, res: express.Response): Promise<void> => {
        const reverse = queryFlag(req.query.reverse);
        const packages = await resolver.tree(req.params.name, {
            reverse,
            sync: queryFlag(req.query.sync),
        });
        res.status(200).json({ name: req.params.name, reverse, packages });
    };

    const getUpdates = (req: express.Request, res: express.Response): void => {
        res.status(200).json(query.updates());
    };

    const getRepositories = (req: express.Request, res: express.Response): void => {
        res.status(200).json(query.repositories());
    };

    const discover = async (req: express.Request, res: express.Response): Promise<void> => {
        const term = isRecord(req.body) && typeof req.body.term === 'string' ? req.body.term.trim() : '';
        if (term.length < 2) {
            throw new ValidationError('term must be at least 2 characters.');
        }
        await cache.discover(PackageSource.AUR, term);
        res.status(200).json(
            Array.from(query.search(term, { sources: [PackageSource.AUR] })),
        );
    };

    const getCache = (req: express.Request, res: express.Response): void => {
        res.status(200).json(cache.status());
    };

    const refreshCache = async (req: express.Request, res: express.Response): Promise<void> => {
        const source = parseSourceParam(req.params.source);
        const snapshot = await cache.refresh(source);
        res.status(200).json({
            source,
            generation: snapshot.generation,
            takenAt: snapshot.takenAt,
            size: snapshot.size,
        });
    };

    const invalidateCache = (req: express.Request, res: express.Response): void => {
        const source = parseSourceParam(req.params.source);
        cache.invalidate(source);
        res.status(200).json({ msg: `Invalidated ${source}` });
    };

    const submitOperation = (req: express.Request, res: express.Response): void => {
        const request = parseOperationRequest(req.body, guessSource);
        const session = orchestrator.submit(request);
        res.status(202).json(session);
    };

    const listOperations = (req: express.Request, res: express.Response): void => {
        res.status(200).json(orchestrator.list());
    };

    const getOperation = (req: express.Request, res: express.Response): void => {
        const info = orchestrator.get(req.params.id);
        if (!info) {
            throw new NotFoundError(`Operation ${req.params.id} not found`);
        }
        res.status(200).json(info);
    };

    const streamEvents = async (req: express.Request, res: express.Response): Promise<void> => {
        if (!orchestrator.get(req.params.id)) {
            throw new NotFoundError(`Operation ${req.params.id} not found`);
        }
        let closed = false;
        res.on('close', () => {
            closed = true;
        });
        res.status(200).set({
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            Connection: 'keep-alive',
        });
        res.flushHeaders();
        for await (const event of orchestrator.subscribe(req.params.id)) {
            if (closed) {
                break;
            }
            res.write(`id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
        }
        res.end();
    };

    const cancelOperation = (req: express.Request, res: express.Response): void => {
        const cancelled = orchestrator.cancel(req.params.id);
        res.status(200).json({
            msg: cancelled ? 'Cancellation requested' : 'Operation already finished',
            cancelled,
        });
    };

    const getCredentialRequests = (req: express.Request, res: express.Response): void => {
        res.status(200).json(broker.pending());
    };

    const answerCredential = (req: express.Request, res: express.Response): void => {
        const body: unknown = req.body;
        if (!isRecord(body)) {
            throw new ValidationError('Body must be an object.');
        }
        let answered: boolean;
        if (body.deny === true) {
            answered = broker.deny(req.params.id);
        } else if (typeof body.password === 'string') {
            answered = broker.supply(req.params.id, body.password);
        } else {
            throw new ValidationError('password or deny is required.');
        }
        if (!answered) {
            throw new NotFoundError(`Operation ${req.params.id} is not waiting for a credential`);
        }
        res.status(200).json({ msg: body.deny === true ? 'Declined' : 'Accepted' });
    };

    return {
        searchPackages: handle(searchPackages),
        getPackage: handle(getPackage),
        getTree: handle(getTree),
        getUpdates: handle(getUpdates),
        getRepositories: handle(getRepositories),
        discover: handle(discover),
        getCache: handle(getCache),
        refreshCache: handle(refreshCache),
        invalidateCache: handle(invalidateCache),
        submitOperation: handle(submitOperation),
        listOperations: handle(listOperations),
        getOperation: handle(getOperation),
        streamEvents: handle(streamEvents),
        cancelOperation: handle(cancelOperation),
        getCredentialRequests: handle(getCredentialRequests),
        answerCredential: handle(answerCredential),
    };
};

export default controller;
export type { Services };
