// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { studyServices } from '@/lib/services'
import { createTextAnalysisHandler } from './handler'

export const dynamic = 'force-dynamic'

export const POST = createTextAnalysisHandler(studyServices)
