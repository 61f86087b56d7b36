export type LogLevel = 'info' | 'warn' | 'error';

export type LogListener = (entry: LogEntry) => void;

export interface LogEntry {
    timestamp: number;
    message: string;
    level: LogLevel;
}

class DebugLogger {
    private logs: LogEntry[] = [];
    private maxLogs = 100;
    private echo = true;
    private listeners: LogListener[] = [];

    log(message: string, level: LogLevel = 'info') {
        const entry: LogEntry = { timestamp: Date.now(), message, level };
        this.logs.unshift(entry);
        if (this.logs.length > this.maxLogs) {
            this.logs.pop();
        }
        if (this.echo) {
            if (level === 'error') {
                console.error(`[DEBUG] ${message}`);
            } else if (level === 'warn') {
                console.warn(`[DEBUG] ${message}`);
            } else {
                console.log(`[DEBUG] ${message}`);
            }
        }
        this.notify(entry);
    }

    error(message: string) {
        this.log(message, 'error');
    }

    warn(message: string) {
        this.log(message, 'warn');
    }

    /** Turns console output on or off; entries are still buffered. */
    setEcho(enabled: boolean) {
        this.echo = enabled;
    }

    /** Buffered entries, newest first. */
    getLogs(): LogEntry[] {
        return [...this.logs];
    }

    clear() {
        this.logs = [];
    }

    /** Calls `listener` with every new entry until the returned function is called. */
    subscribe(listener: LogListener) {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    private notify(entry: LogEntry) {
        this.listeners.forEach(l => l(entry));
    }
}

export const debugLog = new DebugLogger();
