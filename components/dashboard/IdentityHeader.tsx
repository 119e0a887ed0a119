import React from 'react';
import type { DashboardUser } from '../../types';
import { avatarLetter, isAdmin } from '../../utils/streets';

interface IdentityHeaderProps {
  user?: DashboardUser | null;
}

const IdentityHeader: React.FC<IdentityHeaderProps> = ({ user }) => (
  <div className="flex items-center gap-4">
    <div
      id="avatarLetter"
      className="w-11 h-11 rounded-2xl bg-blue-600 flex items-center justify-center text-sm font-black text-white shadow-[0_10px_30px_rgba(59,130,246,0.3)]"
    >
      {avatarLetter(user)}
    </div>
    <div className="flex flex-col min-w-0">
      <div className="flex items-center gap-2">
        <span id="userName" className="font-black text-sm truncate">
          {user?.name || 'User'}
        </span>
        {isAdmin(user) && (
          <span
            id="adminBadge"
            className="inline-flex px-2 py-0.5 rounded-md bg-amber-500/10 border border-amber-500/20 text-amber-400 text-[9px] font-black uppercase tracking-widest"
          >
            Admin
          </span>
        )}
      </div>
      <span id="userEmail" className="text-[10px] text-zinc-500 font-mono truncate">
        {user?.email || ''}
      </span>
    </div>
  </div>
);

export default IdentityHeader;
