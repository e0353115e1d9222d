export type SwitcherErrorKind = 'connection' | 'parameter' | 'lookup' | 'request';

export class InstanceSwitcherError extends Error {
    constructor(
        message: string,
        public kind: SwitcherErrorKind,
        public method: string,
        public target?: string,
        public host?: string | null,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'InstanceSwitcherError';
    }
}
