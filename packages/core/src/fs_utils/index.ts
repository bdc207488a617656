export { writeFileAtomic, readFileIfExists, isErrnoException } from './atomic_write';
