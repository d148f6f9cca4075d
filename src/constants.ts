export const VERSION = '0.3.0';
export const PROGRAM_NAME = 'transcribe';
export const DATE_FORMAT_YEAR_MONTH_DAY_HOURS_MINUTES_SECONDS_MILLISECONDS = 'YYYY-MM-DD-HHmmss.SSS';
export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;
export const DEFAULT_LARGE_MODEL = false;
export const DEFAULT_OUTPUT_DIRECTORY = 'output/transcribe';

// Audio settings
export const SAMPLE_RATE = 16000;
export const CHANNELS = 1;
export const SAMPLE_FORMAT = 'S16_LE';
export const BYTES_PER_SAMPLE = 2;
export const WAV_HEADER_BYTES = 44;
export const DEFAULT_AUDIO_DEVICE = 'default';
export const WAVE_OUTPUT_FILENAME = 'temp_recording.wav';

// Recordings longer than this need an explicit go-ahead before they are uploaded
export const DEFAULT_CONFIRM_THRESHOLD_SECONDS = 30;

// Grace period between SIGTERM and SIGKILL when stopping the recorder
export const RECORDER_STOP_TIMEOUT_MS = 1000;

// Mistral API settings
export const MISTRAL_API_BASE_URL = 'https://api.mistral.ai/v1';
export const MISTRAL_API_KEY_ENV = 'MISTRAL_API_KEY';
export const MISTRAL_TIMEOUT_ENV = 'MISTRAL_TIMEOUT_MS';
export const DEFAULT_REQUEST_TIMEOUT_MS = 300000;

// Model names
export const DEFAULT_TRANSCRIPTION_MODEL = 'voxtral-mini-2507';
export const LARGE_TRANSCRIPTION_MODEL = 'voxtral-large-latest';
export const DEFAULT_CHAT_MODEL = 'mistral-small-latest';
export const LARGE_CHAT_MODEL = 'mistral-large-latest';

export const DEFAULT_TARGET_LANGUAGE = 'English';

export const COMMAND_RECORD = 'record';
export const COMMAND_TRANSLATE = 'translate';
export const COMMAND_CHANGE_TONE = 'change-tone';

export const ALLOWED_COMMANDS = [
    COMMAND_RECORD,
    COMMAND_TRANSLATE,
    COMMAND_CHANGE_TONE,
];

export const OUTPUT_FOOTER = '---------------------';

// Define defaults in one place
export const TRANSCRIBE_DEFAULTS = {
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    largeModel: DEFAULT_LARGE_MODEL,
    record: {
        toClipboard: false,
        confirmThreshold: DEFAULT_CONFIRM_THRESHOLD_SECONDS,
        audioDevice: DEFAULT_AUDIO_DEVICE,
        file: WAVE_OUTPUT_FILENAME,
    },
    translate: {
        targetLanguage: DEFAULT_TARGET_LANGUAGE,
    },
};
