// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { successResponse } from '@/lib/api-response'
import { SUBJECTS } from '@/lib/catalog/subject-catalog'

export const dynamic = 'force-dynamic'

export async function GET() {
  return successResponse({ subjects: SUBJECTS }, 'Available subjects')
}
