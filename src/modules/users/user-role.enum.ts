export enum UserRole {
  PLAYER = 'player',
  ADMIN = 'admin',
}
