/**
 * Types Module
 *
 * Identity and backend types shared by the element layer and the backend.
 */

export * from './common';
