// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { io, Socket } from "socket.io-client";
import type { IGreetingReceived } from "./types/IGreeting.js";

const isGreeting = (value: unknown): value is IGreetingReceived => {
    if (typeof value !== 'object' || value === null) return false;
    const candidate: Record<string, unknown> = { ...value };
    return typeof candidate.text === 'string'
        && typeof candidate.sourceDomain === 'number'
        && typeof candidate.sender === 'string'
        && typeof candidate.deliveryHash === 'string';
};

/**
 * Parses one frame of the greeting stream. Returns undefined for anything that is not a greeting.
 */
export const parseGreetingFrame = (data: string): IGreetingReceived | undefined => {
    const frame: unknown = JSON.parse(data);
    if (typeof frame !== 'object' || frame === null || !('greeting' in frame)) return undefined;
    return isGreeting(frame.greeting) ? frame.greeting : undefined;
};

export class DataStreamClient {
    private socket: Socket;
    private url: string;

    constructor(url: string = "http://localhost:3000") {
        this.url = url;
        this.socket = io(this.url);
    }

    public connect(onGreeting: (greeting: IGreetingReceived) => void, onConnect?: () => void, onDisconnect?: () => void): void {
        this.socket.on('connect', () => {
            console.log('Connected to server');
            onConnect?.();
        });

        this.socket.on('greeting', (data: string) => {
            try {
                const greeting = parseGreetingFrame(data);
                if (greeting) onGreeting(greeting);
            } catch (error) {
                console.error('Failed to parse greeting:', error);
            }
        });

        this.socket.on('disconnect', () => {
            console.log('Disconnected from server');
            onDisconnect?.();
        });
    }

    public disconnect(): void {
        this.socket.disconnect();
    }
}
