/**
 * Audio recording subsystem: capture, key handling, the recording session and the
 * long-recording checkpoint.
 */

export { ArecordBackend, buildArecordArgs } from './capture';
export { KeyMonitor, classifyKeyChunk } from './keys';
export { AudioSink } from './sink';
export { RecordingSession } from './session';
export { LengthGate, LENGTH_CONFIRMATION_QUESTION } from './gate';
export { validateAudioFile } from './validation';

export type { ConfirmationPrompt } from './gate';
export type { RecordingSessionOptions } from './session';
export type {
    CaptureBackend,
    CaptureStream,
    DiscardReason,
    KeyEvent,
    KeyInput,
    LengthDecision,
    RecordingConfig,
    RecordingResult,
    SignalSource,
} from './types';
