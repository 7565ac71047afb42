import { z } from "zod"; // zod: runtime schema checks for inbound request contexts

// Selector inputs are plain strings; an absent field simply yields no value.
const AddressZ = z.string().min(1);

export const MessageContextV1Z = z
  .object({
    ip: z.string().min(1).optional(), // client address as seen by the MTA
    helo: z.string().min(1).optional(),
    hostname: z.string().min(1).optional(), // reverse DNS name of the client
    user: z.string().min(1).optional(), // authenticated user, if any
    subject: z.string().optional(),
    from: z
      .object({
        smtp: AddressZ.optional(), // envelope sender
        mime: AddressZ.optional() // From: header address
      })
      .strict()
      .optional(),
    rcpts: z
      .object({
        smtp: z.array(AddressZ).optional(), // envelope recipients, in order
        mime: z.array(AddressZ).optional() // To:/Cc: addresses, in order
      })
      .strict()
      .optional(),
    headers: z.record(z.union([z.string(), z.array(z.string())])).optional() // raw header values by name
  })
  .strict(); // unknown fields are rejected so selectors never read undeclared data

export type MessageContextV1 = z.infer<typeof MessageContextV1Z>;

export function parseMessageContextV1(input: unknown): MessageContextV1 {
  return MessageContextV1Z.parse(input);
}
