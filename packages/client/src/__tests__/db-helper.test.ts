import { describe, it, expect, vi } from 'vitest'
import type { Collection } from 'mongodb'
import { UserDbHelper, type StoredUser } from '../db-helper'

function fakeCollection() {
  const fake = {
    findOne: vi.fn(async (): Promise<StoredUser | null> => null),
    countDocuments: vi.fn(async () => 0),
    deleteMany: vi.fn(async () => ({ acknowledged: true, deletedCount: 0 })),
  }
  return { fake, helper: new UserDbHelper(fake as unknown as Collection<StoredUser>) }
}

describe('UserDbHelper', () => {
  it('maps a stored document to a user', async () => {
    const { fake, helper } = fakeCollection()
    fake.findOne.mockResolvedValueOnce({ _id: '123456782', name: 'A', phone: '+972501234567', address: 'X' })
    expect(await helper.getUserById('123456782')).toEqual({
      id: '123456782',
      name: 'A',
      phone: '+972501234567',
      address: 'X',
    })
    expect(fake.findOne).toHaveBeenCalledWith({ _id: '123456782' })
  })

  it('returns null for an absent user', async () => {
    const { helper } = fakeCollection()
    expect(await helper.getUserById('123456782')).toBeNull()
  })

  it('reports true only when every distinct id is stored', async () => {
    const { fake, helper } = fakeCollection()
    fake.countDocuments.mockResolvedValueOnce(2)
    expect(await helper.usersExist(['123456782', '000000018', '123456782'])).toBe(true)
    expect(fake.countDocuments).toHaveBeenCalledWith({ _id: { $in: ['123456782', '000000018'] } })

    fake.countDocuments.mockResolvedValueOnce(1)
    expect(await helper.usersExist(['123456782', '000000018'])).toBe(false)
  })

  it('treats an empty id list as existing without querying', async () => {
    const { fake, helper } = fakeCollection()
    expect(await helper.usersExist([])).toBe(true)
    expect(fake.countDocuments).not.toHaveBeenCalled()
  })

  it('deletes by id and returns the count', async () => {
    const { fake, helper } = fakeCollection()
    fake.deleteMany.mockResolvedValueOnce({ acknowledged: true, deletedCount: 2 })
    expect(await helper.deleteUsersByIds(['123456782', '000000018'])).toBe(2)
    expect(fake.deleteMany).toHaveBeenCalledWith({ _id: { $in: ['123456782', '000000018'] } })
  })

  it('skips the delete for an empty list', async () => {
    const { fake, helper } = fakeCollection()
    expect(await helper.deleteUsersByIds([])).toBe(0)
    expect(fake.deleteMany).not.toHaveBeenCalled()
  })
})
