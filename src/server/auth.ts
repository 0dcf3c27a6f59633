import express from 'express';
import crypto from 'crypto';
import { API_TOKEN } from '../config';

const auth = (token: string = API_TOKEN): express.RequestHandler => {
    const expected = crypto.createHash('sha256').update(token).digest();
    return (req, res, next): void => {
        let presented = '';
        if (req.headers.authorization && req.headers.authorization.toLowerCase().startsWith('bearer')) {
            presented = req.headers.authorization.split(' ')[1] ?? '';
        }
        const hash = crypto.createHash('sha256').update(presented).digest();
        const match = token !== '' && crypto.timingSafeEqual(expected, hash);

        if (!match) {
            res.status(403).json({ msg: 'Permission denied!' });
            return;
        }
        next();
    };
};

export default auth;
