export { WriteCoordinator, DEFAULT_WRITE_OPTIONS } from './WriteCoordinator';
export { writeObject } from './writeObject';
