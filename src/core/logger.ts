import {getGlobalSettings} from "./settings";

const prefix = '[ola-sema]';

function isTraceOff(): boolean {
    return getGlobalSettings().trace.server === 'off';
}

export function message(info: string) {
    if (isTraceOff()) return;
    console.log(`${prefix} ${info}`);
}

export function error(info: string) {
    if (isTraceOff()) return;
    console.error(`${prefix} ${info}`);
}

export function verbose(info: string) {
    if (getGlobalSettings().trace.server !== 'verbose') return;
    console.log(`${prefix} ${info}`);
}

export const logger = {
    message,
    error,
    verbose,
} as const;
