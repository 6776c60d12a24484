// The package ships no type declarations. Only the surface used by this
// project is described here.
declare module '@vamship/logger' {
    interface ILogFn {
        (message: string, ...args: unknown[]): void;
        (data: object, message?: string, ...args: unknown[]): void;
    }

    export interface ILogger {
        trace: ILogFn;
        debug: ILogFn;
        info: ILogFn;
        warn: ILogFn;
        error: ILogFn;
    }

    export interface ILoggerOptions {
        level?: string;
        destination?: string;
        extreme?: boolean;
    }

    interface ILoggerProvider {
        configure(appName: string, options?: ILoggerOptions): void;
        getLogger(group: string, props?: object): ILogger;
    }

    const _loggerProvider: ILoggerProvider;
    export default _loggerProvider;
}
