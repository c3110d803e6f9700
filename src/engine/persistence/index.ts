export { SAVE_VERSION, SaveGameError, createSaveFile, encodeSave, decodeSave, isSaveFile } from './SaveCodec';
export type { SaveFile } from './SaveCodec';
export { MemorySaveStorage, FileSaveStorage, assertValidSlot } from './SaveStorage';
export type { SaveStorage } from './SaveStorage';
