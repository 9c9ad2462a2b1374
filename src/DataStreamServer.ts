// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import http from 'http';
import express, { Request, Response } from 'express';
import { Server as SocketIOServer } from 'socket.io';
import type { IGreetingReceived } from './types/IGreeting.js';
import type { IHelloRelay } from './types/IHelloRelay.js';
import { sameAddress } from './utils/address.js';

export type GreetingFilter = Partial<Pick<IGreetingReceived, 'sourceDomain' | 'sender'>>;

/**
 * True when the greeting matches every field set in `filters`. Senders compare case-insensitively.
 */
export const matchesFilters = (greeting: IGreetingReceived, filters: GreetingFilter): boolean => {
    if (filters.sourceDomain !== undefined && filters.sourceDomain !== greeting.sourceDomain) {
        return false;
    }
    if (filters.sender !== undefined && !sameAddress(filters.sender, greeting.sender)) {
        return false;
    }
    return true;
};

/**
 * Streams received greetings to socket.io clients and serves the latest one over HTTP.
 */
class DataStreamServer {
    private app: express.Application;
    private server: http.Server;
    private io: SocketIOServer;
    private port: number;
    private filters: GreetingFilter;
    private relay?: IHelloRelay;
    private detach?: () => void;

    constructor(port: number = 3000, filters: GreetingFilter = {}) {
        this.app = express();
        this.server = http.createServer(this.app);
        this.port = port;
        this.filters = filters;

        this.io = new SocketIOServer(this.server, {
            cors: {
                origin: "*",
                methods: ["GET", "OPTIONS"],
            }
        });

        this.configureRoutes();
        this.handleSocketConnections();
    }

    private configureRoutes(): void {
        this.app.get('/latest', (req: Request, res: Response) => {
            if (!this.relay) {
                res.status(503).json({ error: 'no relay attached' });
                return;
            }
            res.json(this.relay.latest());
        });
    }

    private handleSocketConnections(): void {
        this.io.on('connection', (socket) => {
            console.log('A client has connected', socket.id);
        });
    }

    /**
     * Streams every greeting the relay applies from now on.
     */
    public attach(relay: IHelloRelay): void {
        this.detach?.();
        this.relay = relay;
        this.detach = relay.onGreetingReceived((greeting) => this.sendData(greeting));
    }

    public setFilters(filters: GreetingFilter): void {
        this.filters = filters;
    }

    public sendData(greeting: IGreetingReceived): void {
        if (matchesFilters(greeting, this.filters)) {
            this.io.emit('greeting', JSON.stringify({ greeting }));
        }
    }

    public start(): void {
        this.server.listen(this.port, () => {
            console.log(`DataStreamServer is running on port ${this.port}`);
        });
    }

    public async stop(): Promise<void> {
        this.detach?.();
        this.detach = undefined;
        await this.io.close();
    }
}

export default DataStreamServer;
