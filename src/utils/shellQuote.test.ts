import { describe, it, expect } from 'vitest'
import { shellJoin, shellQuote } from './shellQuote.js'

describe('shellQuote', () => {
  it('leaves safe words alone', () => {
    expect(shellQuote('/home/ec2-user/SageMaker')).toBe('/home/ec2-user/SageMaker')
    expect(shellQuote('torch==2.1.0')).toBe('torch==2.1.0')
    expect(shellQuote('python=3.9')).toBe('python=3.9')
  })

  it('single-quotes words with spaces or metacharacters', () => {
    expect(shellQuote('Custom (tensorflow2_p39)')).toBe("'Custom (tensorflow2_p39)'")
    expect(shellQuote('$HOME')).toBe("'$HOME'")
  })

  it('splices embedded single quotes', () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'")
  })

  it('quotes the empty string', () => {
    expect(shellQuote('')).toBe("''")
  })
})

describe('shellJoin', () => {
  it('joins quoted arguments with spaces', () => {
    expect(shellJoin(['echo', 'a b', 'c'])).toBe("echo 'a b' c")
  })
})
