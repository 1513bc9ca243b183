// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { studyServices } from '@/lib/services'
import { createQuizHandler } from './handler'

export const dynamic = 'force-dynamic'

export const POST = createQuizHandler(studyServices)
