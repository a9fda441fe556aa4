export type { Communicator } from './communicator.ts';
export { ScreenCommunicator } from './screen-communicator.ts';
export { FileInputCommunicator } from './file-input-communicator.ts';
export { FileOutputCommunicator } from './file-output-communicator.ts';
export { CommunicatorRegistry } from './communicator-registry.ts';
