// ---------------------------------------------------------------------------
// User handler — CRUD for /users
//
// zod checks only the shape of each body (which keys, which JSON types).
// Content rules (id checksum, phone validity, blank or oversized fields, id
// immutability) belong to the MutationPolicy, whose typed errors are mapped
// to status codes in lib/responses.ts.
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { PartialUpdateBody, ReplaceUserInput } from '@user-registry/domain'
import type { AppEnv } from '../types'
import { serverErrorResponse, shapeErrorResponse, userErrorResponse } from '../lib/responses'

const CreateUserBody = z.object({
  id: z.string(),
  name: z.string(),
  phone: z.string(),
  address: z.string(),
})

const ReplaceUserBody = z.object({
  /** Some clients always echo the id; the policy checks that it matches. */
  id: z.union([z.string(), z.number()]).optional(),
  name: z.string(),
  phone: z.string(),
  address: z.string(),
})

// passthrough keeps an `id` key, if one was sent, so the policy can refuse it.
const PatchUserBody = z
  .object({
    name: z.string().optional(),
    phone: z.string().optional(),
    address: z.string().optional(),
  })
  .passthrough()

export const usersHandler = new Hono<AppEnv>({ strict: false })

usersHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateUserBody.safeParse(value)
    if (!r.success) return shapeErrorResponse(c, r.error)
    return r.data
  }),
  async (c) => {
    try {
      const result = await c.get('users').create(c.req.valid('json'))
      if (!result.ok) return userErrorResponse(c, result.error)
      return c.json(result.value, 201)
    } catch (err) {
      return serverErrorResponse(c, err)
    }
  },
)

usersHandler.get('/', async (c) => {
  try {
    return c.json(await c.get('users').list())
  } catch (err) {
    return serverErrorResponse(c, err)
  }
})

// Registered before '/:id' so "ids" is never taken for a national id.
usersHandler.get('/ids', async (c) => {
  try {
    return c.json(await c.get('users').listIds())
  } catch (err) {
    return serverErrorResponse(c, err)
  }
})

usersHandler.get('/:id', async (c) => {
  try {
    const result = await c.get('users').get(c.req.param('id'))
    if (!result.ok) return userErrorResponse(c, result.error)
    return c.json(result.value)
  } catch (err) {
    return serverErrorResponse(c, err)
  }
})

usersHandler.put(
  '/:id',
  validator('json', (value, c) => {
    const r = ReplaceUserBody.safeParse(value)
    if (!r.success) return shapeErrorResponse(c, r.error)
    return r.data
  }),
  async (c) => {
    const body = c.req.valid('json')
    const input: ReplaceUserInput = {
      name: body.name,
      phone: body.phone,
      address: body.address,
      ...(body.id !== undefined ? { id: body.id } : {}),
    }
    try {
      const result = await c.get('users').replace(c.req.param('id'), input)
      if (!result.ok) return userErrorResponse(c, result.error)
      return c.json(result.value)
    } catch (err) {
      return serverErrorResponse(c, err)
    }
  },
)

usersHandler.patch(
  '/:id',
  validator('json', (value, c) => {
    const r = PatchUserBody.safeParse(value)
    if (!r.success) return shapeErrorResponse(c, r.error)
    return r.data
  }),
  async (c) => {
    const body = c.req.valid('json')
    const input: PartialUpdateBody = {
      ...('id' in body ? { id: body['id'] } : {}),
      ...(body.name !== undefined ? { name: body.name } : {}),
      ...(body.phone !== undefined ? { phone: body.phone } : {}),
      ...(body.address !== undefined ? { address: body.address } : {}),
    }
    try {
      const result = await c.get('users').partialUpdate(c.req.param('id'), input)
      if (!result.ok) return userErrorResponse(c, result.error)
      return c.json(result.value)
    } catch (err) {
      return serverErrorResponse(c, err)
    }
  },
)

usersHandler.delete('/:id', async (c) => {
  try {
    const result = await c.get('users').delete(c.req.param('id'))
    if (!result.ok) return userErrorResponse(c, result.error)
    return c.body(null, 204)
  } catch (err) {
    return serverErrorResponse(c, err)
  }
})
