import { NextResponse } from 'next/server'

export type RouteHandler = (req: Request) => Promise<Response>

const readStringField = (value: unknown, field: 'code' | 'message'): string | undefined => {
  if (!value || typeof value !== 'object' || !(field in value)) return undefined
  const fieldValue: unknown = Reflect.get(value, field)
  return typeof fieldValue === 'string' ? fieldValue : undefined
}

/**
 * Creates a standardized success response.
 *
 * This function generates a JSON response for successful operations,
 * including a status code, message, and data payload.
 *
 * @param data - The data to include in the response.
 * @param message - A message describing the success. Defaults to 'Success'.
 * @param status - The HTTP status code for the response. Defaults to 200.
 * @returns A NextResponse object containing the success response.
 */
export const successResponse = (
  data: unknown,
  message: string = 'Success',
  status: number = 200,
) => {
  return NextResponse.json(
    {
      status,
      message,
      data,
    },
    { status },
  )
}

/**
 * Creates a standardized error response.
 *
 * This function generates a JSON response for error situations,
 * including a status code, error message, and optional error details.
 *
 * @param message - A message describing the error.
 * @param errorDetails - Additional details about the error. Defaults to null.
 * @param status - The HTTP status code for the response. Defaults to 500.
 * @returns A NextResponse object containing the error response.
 */
export const errorResponse = (
  message: string,
  errorDetails: unknown = null,
  status: number = 500,
) => {
  return NextResponse.json(
    {
      status,
      message,
      error: {
        code: readStringField(errorDetails, 'code') ?? 'UNKNOWN_ERROR',
        details:
          readStringField(errorDetails, 'message') ??
          (errorDetails || 'An unexpected error occurred'),
      },
    },
    { status },
  )
}

/**
 * Creates a downloadable file response with the given body and file name.
 */
export const attachmentResponse = (body: string, filename: string, contentType: string) => {
  return new NextResponse(body, {
    status: 200,
    headers: {
      'Content-Type': contentType,
      'Content-Disposition': `attachment; filename="${filename}"`,
    },
  })
}
