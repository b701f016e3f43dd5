import {z} from 'zod'

const PassphraseSchema = z.string().default('')

export const CreateKeystoreRequestSchema = z.object({
  controller: z.string().trim().min(1)
})

export const CreateKeyRequestSchema = z.object({
  keyType: z.string().trim().min(1),
  passphrase: PassphraseSchema
})

export const SignRequestSchema = z.object({
  message: z.string(),
  passphrase: PassphraseSchema
})

export const VerifyRequestSchema = z.object({
  signature: z.string(),
  message: z.string(),
  passphrase: PassphraseSchema
})

export const EncryptRequestSchema = z.object({
  message: z.string(),
  aad: z.string(),
  passphrase: PassphraseSchema
})

export const DecryptRequestSchema = z.object({
  cipherText: z.string(),
  aad: z.string(),
  nonce: z.string(),
  passphrase: PassphraseSchema
})

export type SignResponse = {signature: string}
export type EncryptResponse = {cipherText: string; nonce: string}
export type DecryptResponse = {plainText: string}
