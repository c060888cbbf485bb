/* eslint-disable no-shadow */

export enum ResourceEventType {
  Added = 'ADDED',
  Modified = 'MODIFIED',
  Deleted = 'DELETED',
}
