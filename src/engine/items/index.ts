export { Item } from './Item';
export type { ItemSnapshot } from './Item';
export { JumpPad } from './JumpPad';
export type { JumpPadSnapshot } from './JumpPad';
