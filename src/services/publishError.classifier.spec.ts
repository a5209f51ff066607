import { classifyPublishError } from './publishError.classifier'

describe('classifyPublishError', () => {
  it('maps HTTP statuses', () => {
    expect(classifyPublishError('tiktok', { statusCode: 401, message: 'Bad credentials' })).toBe(
      'authentication_error',
    )
    expect(classifyPublishError('tiktok', { statusCode: 429, message: 'Nope' })).toBe('rate_limited')
    expect(classifyPublishError('tiktok', { statusCode: 503, message: 'Service unavailable' })).toBe('platform_error')
  })

  it('separates bans from auth problems on 403', () => {
    expect(classifyPublishError('linkedin', { statusCode: 403, message: 'Member is restricted' })).toBe(
      'account_banned',
    )
    expect(classifyPublishError('linkedin', { statusCode: 403, message: 'Account suspended for review' })).toBe(
      'account_suspended',
    )
    expect(classifyPublishError('linkedin', { statusCode: 403, message: 'Missing scope' })).toBe(
      'authentication_error',
    )
  })

  it('uses platform error codes before the status', () => {
    expect(classifyPublishError('facebook', { statusCode: 400, errorCode: 17, message: 'User request limit' })).toBe(
      'rate_limited',
    )
    expect(classifyPublishError('facebook', { statusCode: 400, errorCode: 368, message: 'Blocked' })).toBe(
      'account_banned',
    )
    expect(classifyPublishError('twitter', { statusCode: 403, errorCode: 88, message: 'Limit' })).toBe('rate_limited')
    expect(classifyPublishError('twitter', { statusCode: 401, errorCode: 64, message: 'Account suspended' })).toBe(
      'account_suspended',
    )
  })

  it('ignores codes from another platform', () => {
    expect(classifyPublishError('youtube', { errorCode: 17, message: 'Something odd' })).toBe('unknown')
  })

  it('falls back to message keywords', () => {
    expect(classifyPublishError('threads', { message: 'Please slow down' })).toBe('rate_limited')
    expect(classifyPublishError('threads', { message: 'Content rejected by moderation' })).toBe('content_rejected')
    expect(classifyPublishError('threads', { message: 'Token expired at noon' })).toBe('token_expired')
    expect(classifyPublishError('threads', { message: 'Access denied' })).toBe('authentication_error')
    expect(classifyPublishError('threads', { message: 'Marked as spam' })).toBe('account_banned')
  })

  it('treats other client errors as validation errors', () => {
    expect(classifyPublishError('pinterest', { statusCode: 422, message: 'Image too large' })).toBe(
      'validation_error',
    )
  })
})
