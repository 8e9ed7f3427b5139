// src/stateMachine/definedStates.ts

export enum PipelineStates {
    INIT = 'INIT',
    SNIFF_FORMAT = 'SNIFF_FORMAT',
    EXTRACT_FRAME = 'EXTRACT_FRAME',
    ENSURE_ALPHA = 'ENSURE_ALPHA',
    NORMALIZE_SIZE = 'NORMALIZE_SIZE',
    ENCODE_OUTPUT = 'ENCODE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}

export enum BatchStates {
    INIT = 'INIT',
    ENSURE_OUTPUT_DIR = 'ENSURE_OUTPUT_DIR',
    LIST_MATCHES = 'LIST_MATCHES',
    PROCESS_FILES = 'PROCESS_FILES',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
