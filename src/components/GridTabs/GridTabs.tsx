import React, { useState } from 'react';
import type { LucideIcon } from 'lucide-react';

export interface TabDefinition {
  id: string;
  label: string;
  icon?: LucideIcon;
  content: React.ReactNode;
}

interface GridTabsProps {
  tabs: TabDefinition[];
  initialTab?: string;
}

export const GridTabs: React.FC<GridTabsProps> = ({ tabs, initialTab }) => {
  const [activeId, setActiveId] = useState(initialTab ?? tabs[0]?.id);
  const active = tabs.find((tab) => tab.id === activeId) ?? tabs[0];

  return (
    <div className="bg-white rounded-lg shadow">
      <div role="tablist" className="flex border-b">
        {tabs.map((tab) => {
          const Icon = tab.icon;
          const selected = tab.id === active?.id;
          return (
            <button
              key={tab.id}
              role="tab"
              type="button"
              aria-selected={selected}
              aria-controls={`tabpanel-${tab.id}`}
              onClick={() => setActiveId(tab.id)}
              className={`flex items-center gap-2 px-4 py-2 text-sm ${
                selected ? 'border-b-2 border-blue-600 text-blue-600' : 'text-gray-600 hover:text-gray-800'
              }`}
            >
              {Icon && <Icon className="w-4 h-4" />}
              {tab.label}
            </button>
          );
        })}
      </div>
      {/* Inactive panels stay mounted, hidden */}
      {tabs.map((tab) => (
        <div
          key={tab.id}
          role="tabpanel"
          id={`tabpanel-${tab.id}`}
          hidden={tab.id !== active?.id}
          className="p-4"
        >
          {tab.content}
        </div>
      ))}
    </div>
  );
};

export const JsonView: React.FC<{ value: string; label: string }> = ({ value, label }) => (
  <pre aria-label={label} className="text-xs bg-gray-50 rounded p-3 overflow-auto max-h-[32rem]">
    {value}
  </pre>
);
