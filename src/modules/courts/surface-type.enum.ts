export enum SurfaceType {
  GLASS = 'glass',
  WALL = 'wall',
  MIXED = 'mixed',
}
