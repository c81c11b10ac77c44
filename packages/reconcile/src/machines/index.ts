export { MachineList } from './machine-list.js';
