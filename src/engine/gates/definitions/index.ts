export { andGate } from './and.ts';
export { orGate } from './or.ts';
export { nandGate } from './nand.ts';
export { norGate } from './nor.ts';
