import { describe, it, expect } from 'vitest'
import { normalizeFact, factSimilarity, isDuplicateFact, findDuplicate } from '../similarity.js'

describe('normalizeFact', () => {
  it('lowercases, strips punctuation and articles, folds trailing s', () => {
    expect(normalizeFact("  The user's name is Ana. ")).toEqual(['user', 'name', 'is', 'ana'])
    expect(normalizeFact('users name is ana.')).toEqual(['user', 'name', 'is', 'ana'])
  })

  it('leaves short words alone', () => {
    expect(normalizeFact('He has gas')).toEqual(['he', 'has', 'gas'])
  })

  it('returns nothing for blank text', () => {
    expect(normalizeFact('   ')).toEqual([])
  })
})

describe('factSimilarity', () => {
  it('treats possessive and plain forms as the same fact', () => {
    expect(factSimilarity("The user's name is Ana", 'users name is ana.')).toBe(1)
  })

  it('divides shared words by the larger set', () => {
    // {user, like, tea} vs {user, like, green, tea}: 3 shared of 4
    expect(factSimilarity('The user likes tea', 'The user likes green tea')).toBe(0.75)
  })

  it('is 0 when both sides are empty', () => {
    expect(factSimilarity('', '...')).toBe(0)
  })
})

describe('isDuplicateFact', () => {
  it('applies the 0.9 threshold by default', () => {
    expect(isDuplicateFact('The user likes tea', 'the user likes tea!')).toBe(false)
    expect(isDuplicateFact('The user likes tea', 'the user, likes tea.')).toBe(true)
  })

  it('accepts a custom threshold', () => {
    expect(isDuplicateFact('The user likes tea', 'The user likes green tea', 0.75)).toBe(true)
  })
})

describe('findDuplicate', () => {
  const candidates = [
    { id: 'a', factText: 'The user likes green tea' },
    { id: 'b', factText: 'the user likes tea.' },
    { id: 'c', factText: 'The user lives in Lisbon' }
  ]

  it('returns the best match at or above the threshold', () => {
    expect(findDuplicate('The user likes tea', candidates)?.id).toBe('b')
    expect(findDuplicate('The user likes tea', candidates, 0.7)?.id).toBe('b')
  })

  it('returns null when nothing is close enough', () => {
    expect(findDuplicate('The user has a dog', candidates)).toBeNull()
  })
})
