export { default as SocialAccount } from './SocialAccount'
export { default as AccountPool } from './AccountPool'
export { default as PoolMembership } from './PoolMembership'
export { default as DispatchLog } from './DispatchLog'
export { default as StatusLog } from './StatusLog'
